export { default as logger, NoopLogger, setLogLevel } from './logger'
export type { Logger } from './logger'
