/**
 * Berth CLI Commands
 *
 * Commands are organized into groups:
 * - environment/  - Environment setup and convergence (init, apply, ls, update, site, debug, hosts)
 */

export {
  applyCommand,
  initCommand,
  lsCommand,
  updateCommand,
  siteCommand,
  debugCommand,
  hostsCommand,
} from './environment';
