export { createLogger, getDefaultLogger, setDefaultLogger } from './logger.js'
export type { LoggerOptions } from './logger.js'
