/**
 * Domain model exports.
 */

export * from './errors';
export * from './events';
export * from './run';
export * from './workflow';
