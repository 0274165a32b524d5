export {
  ConflictError,
  HotGraphError,
  HotGraphErrorCode,
  InvalidInputError,
  isHotGraphError,
  MalformedGraphError,
  NotFoundError,
  NotReachableError,
  PersistenceError,
  toErrorInfo,
} from './errors'
export type { ErrorInfo } from './errors'

export { createLogger, createStderrLogger, logger, LogLevels, parseLogLevel, setLogLevel, useStderr } from './logger'
export type { LogLevelName } from './logger'
