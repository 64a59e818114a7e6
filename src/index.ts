/**
 * Candlestick chart rendering service
 *
 * Decodes chart requests, renders them to PNG and announces the written files.
 */
export * from './artifacts'
export * from './colors'
export * from './errors'
export * from './layout'
export * from './models'
export * from './notifications'
export * from './render'
export * from './scales'
export * from './server'
export * from './transport'
export { NoopLogger, setLogLevel } from './utils'
export type { Logger } from './utils'
export {
  applyConfigOverrides,
  ConfigLoadError,
  ConfigValidationError,
  createDefaultServiceConfig,
  DEFAULT_CONFIG_FILE,
  loadServiceConfig,
  validateServiceConfig
} from './cli/config-loader'
export type { ChartServiceConfig, ConfigOverrides } from './cli/config-loader'
