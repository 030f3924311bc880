/**
 * Protocol exports (DoIP, UDS).
 * @module protocols
 */
export * from './doip';
export * from './uds';
