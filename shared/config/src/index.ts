/**
 * @txcore/config
 *
 * Chain and engine configuration: zod schemas with defaults plus the
 * file/environment loader used at service startup.
 */

export {
  EthereumAddressSchema,
  RpcUrlSchema,
  UrlSchema,
  BasisPointsSchema,
  PositiveIntSchema,
  NonNegativeIntSchema,
  ChainIdSchema,
  RetryBackoffSchema,
  ChainConfigSchema,
  AlertConfigSchema,
  LogLevelSchema,
  EngineConfigSchema,
  formatIssues,
} from './schemas';
export type {
  ChainConfig,
  ChainConfigInput,
  EngineConfig,
} from './schemas';

export {
  DEFAULT_CONFIG_PATH,
  loadEngineConfig,
  parseEngineConfig,
  resolveChainConfig,
} from './engine-config';
export type { LoadEngineConfigOptions } from './engine-config';
