/**
 * ISO 13400-2 (DoIP) exports.
 * @module doip
 */
export * from './constants';
export * from './errors';
export * from './frame';
export * from './messages';
export * from './connection';
export * from './discovery';
