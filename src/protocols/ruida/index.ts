/**
 * Ruida UDP protocol exports.
 * @module ruida
 */
export * from './constants';
export * from './util';
export * from './errors';
export * from './checksum';
export * from './chunk';
export * from './transport';
export * from './ack';
export * from './session';
export * from './sink';
export * from './sender';
export * from './relay';
