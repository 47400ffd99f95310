import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  type ILoggableComponent,
  type ILoggingHost,
  type LogEntry,
  type LogLevel,
  type Logger,
  type ResolverLoggingConfig,
  type ShouldLogFn,
  LogStore,
  ResolverComponent,
  createFilter,
  createLoggingHost,
  isLogLevel,
  withScopeAndFiltering,
} from '../../src/logging/logger'

class TestHost implements ILoggingHost {
  clientId = 'abcdef12'
  logs: LogEntry[] = []
  private readonly shouldLog: ShouldLogFn

  constructor(config: ResolverLoggingConfig = { level: 'debug' }) {
    this.shouldLog = createFilter(config)
  }

  scopedLoggerFor(component: ILoggableComponent): Logger {
    return withScopeAndFiltering(component, this.shouldLog, {
      onCapture: (entry) => this.logs.push(entry),
    })
  }
}

class TestLookup extends ResolverComponent {
  static logName = 'lookup'

  constructor(host: ILoggingHost, target?: string) {
    super(host)
    this.targetKey = target
  }

  log(level: LogLevel, message: string, ...args: unknown[]): void {
    this.logger[level](message, ...args)
  }
}

class NamedLookup extends TestLookup {
  constructor(host: ILoggingHost) {
    super(host)
    this.instanceLogName = 'custom'
  }
}

describe('component logging', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prefixes messages with client and component', () => {
    const host = new TestHost()
    new TestLookup(host).log('info', 'started', 3)

    expect(host.logs).toHaveLength(1)
    expect(host.logs[0].level).toBe('info')
    expect(host.logs[0].message).toBe('[Client[abcd]:Lookup] started')
    expect(host.logs[0].args).toEqual([3])
  })

  it('tags entries with the target key', () => {
    const host = new TestHost()
    new TestLookup(host, 'ybndrfg8ejkm').log('warn', 'slow')
    expect(host.logs[0].message).toBe('[Client[abcd]:Lookup[ybnd]] slow')
  })

  it('uses an instance name when set', () => {
    const host = new TestHost()
    new NamedLookup(host).log('info', 'x')
    expect(host.logs[0].message).toBe('[Client[abcd]:custom] x')
  })

  it('filters by level', () => {
    const host = new TestHost({ level: 'warn' })
    const lookup = new TestLookup(host)
    lookup.log('info', 'hidden')
    lookup.log('error', 'shown')
    expect(host.logs.map((e) => e.level)).toEqual(['error'])
  })

  it('filters by component', () => {
    const host = new TestHost({ level: 'debug', excludeComponents: ['lookup'] })
    new TestLookup(host).log('error', 'hidden')
    expect(host.logs).toHaveLength(0)
  })

  it('filters by target key', () => {
    const host = new TestHost({ level: 'debug', includeInstanceValues: ['wanted'] })
    new TestLookup(host, 'other').log('info', 'hidden')
    new TestLookup(host, 'wanted').log('info', 'shown')
    new TestLookup(host).log('info', 'untargeted')
    expect(host.logs.map((e) => e.message)).toEqual([
      '[Client[abcd]:Lookup[want]] shown',
      '[Client[abcd]:Lookup] untargeted',
    ])
  })

  it('requires a static logName', () => {
    class Nameless extends ResolverComponent {
      static logName = ''
    }
    expect(() => new Nameless(new TestHost())).toThrow('missing static logName')
  })

  it('writes to the console when only observing', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})
    const seen: LogEntry[] = []
    const host = createLoggingHost({ level: 'info' }, { onLog: (entry) => seen.push(entry) })

    new TestLookup(host).log('info', 'hello')

    expect(info).toHaveBeenCalledTimes(1)
    expect(info.mock.calls[0][1]).toBe('hello')
    expect(seen).toHaveLength(1)
    expect(seen[0].message).toBe(`[Client[${host.clientId.slice(0, 4)}]:Lookup] hello`)
  })
})

describe('LogStore', () => {
  it('keeps the newest entries up to its size', () => {
    const store = new LogStore(2)
    store.add('info', 'a', [])
    store.add('warn', 'b', [])
    store.add('error', 'c', [])
    expect(store.size).toBe(2)
    expect(store.get().map((e) => e.message)).toEqual(['b', 'c'])
  })

  it('filters by minimum level and limit', () => {
    const store = new LogStore()
    store.add('debug', 'a', [])
    store.add('warn', 'b', [])
    store.add('error', 'c', [])
    expect(store.get('warn').map((e) => e.message)).toEqual(['b', 'c'])
    expect(store.get(undefined, 1).map((e) => e.message)).toEqual(['c'])
    store.clear()
    expect(store.size).toBe(0)
  })
})

describe('isLogLevel', () => {
  it('recognizes the four levels', () => {
    expect(isLogLevel('debug')).toBe(true)
    expect(isLogLevel('error')).toBe(true)
    expect(isLogLevel('trace')).toBe(false)
    expect(isLogLevel(1)).toBe(false)
  })
})
