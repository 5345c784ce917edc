/**
 * Container generators
 * Turn an environment config into the networks, volumes and containers
 * berth creates
 */

export * from './types';
export * from './database';
export * from './service';
export * from './site';
export * from './proxy';
