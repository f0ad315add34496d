/**
 * Remote-control protocol exports.
 * @module protocol
 */
export * from './constants';
export * from './errors';
export * from './codec';
export * from './message';
