export {
  ENV_KEYS,
  configFromEnv,
  readConfigFile,
  loadNavigationConfig,
} from './load-config.js';
export type { LoadConfigOptions } from './load-config.js';
