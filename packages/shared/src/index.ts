export {
  createLogger,
  getRootLogLevel,
  type Logger,
  type LoggerConfig,
  type LogLevel,
  setRootLogLevel,
} from './logger'
export type { JsonPrimitive, JsonValue } from './types'
