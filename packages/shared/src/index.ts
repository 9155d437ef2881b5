/**
 * @geoalerts/shared
 *
 * Core of the geo alert store. Disk access goes through FileSystemAdapter,
 * so the host (station daemon, CLI, tests) supplies the file system.
 */

export * from './storage/types';
export * from './logging';
export * from './alerts';
