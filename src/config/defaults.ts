import type { PathFracConfig } from './types.js';

export const CONFIG_FILE_NAME = '.pathfrac.json';

export const DEFAULT_CONFIG: PathFracConfig = {
  version: 1,
  store: {
    dbPath: '.pathfrac/paths.db',
  },
  output: {
    format: 'text',
  },
  log: {
    level: 'warn',
  },
};
