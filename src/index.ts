/**
 * DoIP transport and UDS diagnostic client.
 * @module node-doip
 */
export * from './protocols';
export * from './core';
