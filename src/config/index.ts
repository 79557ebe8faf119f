export {
  RouterConfigSchema,
  DEFAULT_ROUTER_CONFIG,
  type RouterConfig,
  type RouterConfigPatch,
} from './schema.js';
export {
  readRouterConfig,
  parseRouterConfig,
  mergeRouterConfig,
  RouterConfigError,
  DEFAULT_CONFIG_PATH,
} from './reader.js';
export { silentLogger, type Logger } from './logger.js';
