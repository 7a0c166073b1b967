/**
 * Domain model exports.
 */

export * from './artifact';
export * from './context';
export * from './entities';
export * from './errors';
export * from './evaluation';
export * from './events';
export * from './guidance';
export * from './invitation';
export * from './profile';
export * from './project';
export * from './provider';
export * from './rbac';
export * from './rule-type';
export * from './user';
