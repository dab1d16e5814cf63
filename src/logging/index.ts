export {
  createLogger,
  silentLogger,
  type DiagnosticLogger,
  type LoggerOptions,
} from './logger.js'
