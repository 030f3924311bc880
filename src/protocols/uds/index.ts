/**
 * ISO 14229-1 (UDS) exports.
 * @module uds
 */
export * from './constants';
export * from './errors';
export * from './codec';
export * from './data-identifiers';
export * from './session';
export * from './client';
