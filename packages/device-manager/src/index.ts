/**
 * Device Manager - Removable block device discovery
 * Enumerates disks, checks mounts and resolves flash targets
 */

export * from './types';
export * from './schemas';
export * from './constants';
export * from './errors';
export * from './command-runner';
export * from './mounts';
export * from './device-manager';
export * from './device-detector';
