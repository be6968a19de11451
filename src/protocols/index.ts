/**
 * Protocol exports.
 * @module protocols
 */
export * from './ruida';
