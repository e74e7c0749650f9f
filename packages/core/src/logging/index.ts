export { createLogger, LOGGER_NAME, type LoggerOptions } from './logger'
