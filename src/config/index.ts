/**
 * Config module exports
 */

export {
  configSchema,
  chainConfigSchema,
  backoffConfigSchema,
  randomConfigSchema,
  type Config,
  type ChainConfig,
  type BackoffConfig,
  type RandomConfig,
} from './schema.js';

export { parseConfig, getDefaultConfig } from './parse.js';
