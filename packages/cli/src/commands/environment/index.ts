/**
 * Environment commands
 * Commands for setting up and converging a local environment
 */

export { applyCommand } from './apply';
export { initCommand } from './init';
export { lsCommand } from './ls';
export { updateCommand } from './update';
export { siteCommand } from './site';
export { debugCommand } from './debug';
export { hostsCommand } from './hosts';
