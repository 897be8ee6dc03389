export type LogLevel = 'debug' | 'info' | 'warn' | 'error'
export type LogThreshold = LogLevel | 'silent'
export type LogFields = Record<string, unknown>
export type LogSink = (line: string) => void

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export function isLogThreshold(value: string): value is LogThreshold {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value)
}

function serializeError(err: unknown): LogFields {
  if (!(err instanceof Error)) return { error: String(err) }
  return {
    error_name: err.name,
    error_message: err.message,
    error_stack: err.stack,
  }
}

// bigint amounts show up in most claim logs; JSON.stringify rejects them
function replacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value
}

function defaultThreshold(): LogThreshold {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase()
  return fromEnv && isLogThreshold(fromEnv) ? fromEnv : 'info'
}

export interface LoggerOptions {
  level?: LogThreshold
  sink?: LogSink
}

export class StructuredLogger {
  readonly level: LogThreshold
  private readonly sink: LogSink

  constructor(
    private readonly baseFields: LogFields = {},
    options: LoggerOptions = {},
  ) {
    this.level = options.level ?? defaultThreshold()
    this.sink = options.sink ?? ((line) => console.log(line))
  }

  child(fields: LogFields): StructuredLogger {
    return new StructuredLogger({ ...this.baseFields, ...fields }, { level: this.level, sink: this.sink })
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level]
  }

  private emit(level: LogLevel, message: string, fields?: LogFields, err?: unknown) {
    if (!this.isEnabled(level)) return
    const payload: LogFields = {
      ts: new Date().toISOString(),
      level,
      msg: message,
      ...this.baseFields,
      ...(fields || {}),
      ...(err !== undefined ? serializeError(err) : {}),
    }
    this.sink(JSON.stringify(payload, replacer))
  }

  debug(message: string, fields?: LogFields) { this.emit('debug', message, fields) }
  info(message: string, fields?: LogFields) { this.emit('info', message, fields) }
  warn(message: string, fields?: LogFields, err?: unknown) { this.emit('warn', message, fields, err) }
  error(message: string, fields?: LogFields, err?: unknown) { this.emit('error', message, fields, err) }
}

export function createLogger(baseFields: LogFields = {}, options: LoggerOptions = {}): StructuredLogger {
  return new StructuredLogger(baseFields, options)
}

export type Labels = Record<string, string>

function labelsKey(labels?: Labels): string {
  if (!labels || Object.keys(labels).length === 0) return ''
  return Object.keys(labels).sort().map((k) => `${k}=${labels[k]}`).join(',')
}

function parseLabels(key: string): Labels {
  return key ? Object.fromEntries(key.split(',').map((pair) => pair.split('='))) : {}
}

export class Counter {
  private values = new Map<string, number>()
  constructor(public readonly name: string, public readonly help: string) {}

  inc(labels?: Labels, value = 1) {
    const key = labelsKey(labels)
    this.values.set(key, (this.values.get(key) || 0) + value)
  }

  get(labels?: Labels): number {
    return this.values.get(labelsKey(labels)) || 0
  }

  snapshot(): Array<{ labels: Labels; value: number }> {
    return Array.from(this.values.entries()).map(([k, value]) => ({ labels: parseLabels(k), value }))
  }
}

interface HistogramSeries {
  count: number
  sum: number
  min: number
  max: number
}

export class Histogram {
  private values = new Map<string, HistogramSeries>()
  constructor(
    public readonly name: string,
    public readonly help: string,
    public readonly unit = 'ms',
    private readonly now: () => number = () => performance.now(),
  ) {}

  observe(value: number, labels?: Labels) {
    const key = labelsKey(labels)
    const current = this.values.get(key) || { count: 0, sum: 0, min: Number.POSITIVE_INFINITY, max: Number.NEGATIVE_INFINITY }
    current.count += 1
    current.sum += value
    current.min = Math.min(current.min, value)
    current.max = Math.max(current.max, value)
    this.values.set(key, current)
  }

  /**
   * Start timing an operation. The returned function records the elapsed
   * time (in this histogram's unit, assumed ms) and returns it.
   */
  startTimer(labels?: Labels): (extraLabels?: Labels) => number {
    const startedAt = this.now()
    return (extraLabels) => {
      const elapsed = this.now() - startedAt
      this.observe(elapsed, { ...labels, ...extraLabels })
      return elapsed
    }
  }

  snapshot(): Array<{
    labels: Labels
    count: number
    sum: number
    avg: number
    min: number
    max: number
    unit: string
  }> {
    return Array.from(this.values.entries()).map(([k, v]) => ({
      labels: parseLabels(k),
      count: v.count,
      sum: v.sum,
      avg: v.count > 0 ? v.sum / v.count : 0,
      min: v.count > 0 ? v.min : 0,
      max: v.count > 0 ? v.max : 0,
      unit: this.unit,
    }))
  }
}

export class MetricsRegistry {
  private counters = new Map<string, Counter>()
  private histograms = new Map<string, Histogram>()

  counter(name: string, help: string): Counter {
    const existing = this.counters.get(name)
    if (existing) return existing
    const c = new Counter(name, help)
    this.counters.set(name, c)
    return c
  }

  histogram(name: string, help: string, unit = 'ms'): Histogram {
    const existing = this.histograms.get(name)
    if (existing) return existing
    const h = new Histogram(name, help, unit)
    this.histograms.set(name, h)
    return h
  }

  asJson() {
    return {
      counters: Array.from(this.counters.values()).map((c) => ({
        name: c.name,
        help: c.help,
        series: c.snapshot(),
      })),
      histograms: Array.from(this.histograms.values()).map((h) => ({
        name: h.name,
        help: h.help,
        series: h.snapshot(),
      })),
    }
  }
}

export function createMetricsRegistry(): MetricsRegistry {
  return new MetricsRegistry()
}
