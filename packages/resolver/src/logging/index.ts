export {
  LOG_LEVELS,
  ResolverComponent,
  LogStore,
  globalLogStore,
  buildInjectedContext,
  createFilter,
  createLoggingHost,
  isLogLevel,
  randomClientId,
  withScopeAndFiltering,
} from './logger'
export type {
  ILoggableComponent,
  ILoggingHost,
  LogCallbacks,
  LogContext,
  LogEntry,
  LogLevel,
  Logger,
  ResolverLoggingConfig,
  ShouldLogFn,
} from './logger'
