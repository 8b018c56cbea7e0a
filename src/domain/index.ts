/**
 * Domain model exports.
 */

export * from './audit';
export * from './confirmation';
export * from './deployment';
export * from './environment';
export * from './errors';
export * from './image-state';
export * from './rbac';
