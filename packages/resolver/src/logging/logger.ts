import { EventEmitter, type EventMap, type Listener } from '../utils/event-emitter'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

const LEVEL_NAMES: ReadonlySet<string> = new Set(LOG_LEVELS)

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export interface ResolverLoggingConfig {
  level: LogLevel
  includeComponents?: string[] // e.g. ["lookup", "krpc"]
  excludeComponents?: string[]
  includeInstanceValues?: string[] // compare against instanceValue (target key)
  excludeInstanceValues?: string[]
}

export interface LogContext {
  component: string
  name: string
  clientId: string
  instanceKey?: string
  instanceValue?: string
}

export type ShouldLogFn = (level: LogLevel, context: LogContext) => boolean

export interface ILoggableComponent {
  getLogName(): string
  getStaticLogName(): string
  loggingHost: ILoggingHost
  /** z-base-32 key of the lookup target, for per-target filtering */
  targetKey?: string
}

export interface ILoggingHost {
  clientId: string
  scopedLoggerFor(component: ILoggableComponent): Logger
}

export interface LogEntry {
  timestamp: number
  level: LogLevel
  message: string
  args: unknown[]
}

/**
 * Callbacks for logging side-effects.
 *
 * onLog observes entries that are also written to the console. onCapture
 * takes the entry instead of the console (tests, log panes).
 */
export interface LogCallbacks {
  onLog?: (entry: LogEntry) => void
  onCapture?: (entry: LogEntry) => void
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LEVEL_NAMES.has(value)
}

export class ResolverComponent<Events extends EventMap<Events> = Record<string, Listener>>
  extends EventEmitter<Events>
  implements ILoggableComponent
{
  protected host: ILoggingHost

  public get loggingHost(): ILoggingHost {
    return this.host
  }

  // Required: stable identifier for each component class
  static logName: string = 'component'

  // Optional per-instance override
  protected instanceLogName?: string
  private readonly staticLogName: string
  private _logger?: Logger

  public targetKey?: string

  constructor(host: ILoggingHost) {
    super()
    this.host = host

    this.staticLogName = new.target.logName
    if (!this.staticLogName) {
      throw new Error(`ResolverComponent subclass missing static logName: ${new.target.name}`)
    }
  }

  protected get logger(): Logger {
    if (!this._logger) {
      this._logger = this.host.scopedLoggerFor(this)
    }
    return this._logger
  }

  getLogName(): string {
    return this.instanceLogName ?? this.staticLogName
  }

  getStaticLogName(): string {
    return this.staticLogName
  }
}

export function buildInjectedContext(component: ILoggableComponent): LogContext {
  const ctx: LogContext = {
    component: component.getStaticLogName(),
    name: component.getLogName(),
    clientId: component.loggingHost.clientId,
  }

  if (component.targetKey) {
    ctx.instanceKey = 'target'
    ctx.instanceValue = component.targetKey
  }

  return ctx
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

function passesLevel(msgLevel: LogLevel, configLevel: LogLevel): boolean {
  return LEVEL_PRIORITY[msgLevel] >= LEVEL_PRIORITY[configLevel]
}

export function createFilter(cfg: ResolverLoggingConfig): ShouldLogFn {
  return (level, ctx) => {
    if (!passesLevel(level, cfg.level)) return false

    const comp = ctx.component
    const inst = ctx.instanceValue

    if (cfg.excludeComponents?.includes(comp)) return false
    if (cfg.includeComponents && !cfg.includeComponents.includes(comp)) return false

    if (inst) {
      if (cfg.excludeInstanceValues?.includes(inst)) return false
      if (cfg.includeInstanceValues && !cfg.includeInstanceValues.includes(inst)) return false
    }

    return true
  }
}

type LogFn = (message: string, ...args: unknown[]) => void

const NOOP: LogFn = () => {}

/**
 * Creates a scoped logger with filtering and optional callbacks.
 *
 * Without callbacks the returned functions are console methods bound to the
 * prefix, so the console attributes each line to the caller rather than to
 * this file. All side-effects happen here so no wrapper sits between the
 * caller and the console.
 */
export function withScopeAndFiltering(
  component: ILoggableComponent,
  shouldLog: ShouldLogFn,
  callbacks?: LogCallbacks,
): Logger {
  const getLogger = (level: LogLevel): LogFn => {
    const ctx = buildInjectedContext(component)
    if (!shouldLog(level, ctx)) return NOOP

    const prefix = formatPrefix(ctx)
    const consoleFn: LogFn = console[level].bind(console, prefix)

    if (!callbacks?.onLog && !callbacks?.onCapture) {
      return consoleFn
    }

    return (message, ...args) => {
      const entry: LogEntry = {
        timestamp: Date.now(),
        level,
        message: `${prefix} ${message}`,
        args,
      }
      if (callbacks.onCapture) {
        callbacks.onCapture(entry)
      } else {
        consoleFn(message, ...args)
      }
      callbacks.onLog?.(entry)
    }
  }

  return {
    get debug() {
      return getLogger('debug')
    },
    get info() {
      return getLogger('info')
    },
    get warn() {
      return getLogger('warn')
    },
    get error() {
      return getLogger('error')
    },
  }
}

function formatPrefix(ctx: LogContext): string {
  const parts: string[] = []

  if (ctx.clientId) {
    parts.push(`Client[${ctx.clientId.slice(0, 4)}]`)
  }

  if (ctx.name && ctx.name !== ctx.component) {
    parts.push(ctx.name)
  } else if (ctx.component) {
    // Capitalize component name
    const compStr = ctx.component.charAt(0).toUpperCase() + ctx.component.slice(1)

    if (ctx.instanceValue) {
      parts.push(`${compStr}[${ctx.instanceValue.slice(0, 4)}]`)
    } else {
      parts.push(compStr)
    }
  }

  return parts.length > 0 ? `[${parts.join(':')}]` : ''
}

/**
 * Bounded store of recent log entries, oldest dropped first.
 */
export class LogStore {
  private logs: LogEntry[] = []

  constructor(private readonly maxLogs: number = 500) {}

  add(level: LogLevel, message: string, args: unknown[]): void {
    this.logs.push({ timestamp: Date.now(), level, message, args })
    if (this.logs.length > this.maxLogs) {
      this.logs.shift()
    }
  }

  /**
   * Entries at or above `level`, newest last, at most `limit` of them.
   */
  get(level?: LogLevel, limit?: number): LogEntry[] {
    const matching = level ? this.logs.filter((e) => passesLevel(e.level, level)) : [...this.logs]
    return limit === undefined ? matching : matching.slice(-limit)
  }

  clear(): void {
    this.logs = []
  }

  get size(): number {
    return this.logs.length
  }
}

export const globalLogStore = new LogStore()

export function randomClientId(): string {
  return Math.random().toString(36).substring(2, 15)
}

/**
 * Default logging host: console output filtered by `config`, with every
 * emitted entry recorded in globalLogStore unless other callbacks are given.
 */
export function createLoggingHost(
  config: ResolverLoggingConfig = { level: 'info' },
  callbacks: LogCallbacks = {
    onLog: (entry) => globalLogStore.add(entry.level, entry.message, entry.args),
  },
): ILoggingHost {
  const shouldLog = createFilter(config)
  return {
    clientId: randomClientId(),
    scopedLoggerFor: (component) => withScopeAndFiltering(component, shouldLog, callbacks),
  }
}
