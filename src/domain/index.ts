/**
 * Domain model exports.
 */

export * from './errors';
export * from './graph';
export * from './run';
export * from './state';
