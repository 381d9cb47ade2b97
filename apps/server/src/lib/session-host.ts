import {
  LiveSession,
  RegressionDriver,
  type Co2Source,
  type LiveFrame,
  type SessionLogger,
} from '@lunchbox/gas-exchange'
import { configReportOptions, configVolumeLitres, type SessionConfig } from '@lunchbox/config'

export interface SessionHostOptions {
  /** Opens the CO2 source for a new session */
  openSource: () => Co2Source
  logger: SessionLogger
  /** Milliseconds since epoch */
  now?: () => number
}

export interface SessionSummary {
  running: boolean
  ticks: number
  failedTicks: number
  bufferedSamples: number
  error: string | null
}

/**
 * Holds at most one live session for the process.
 */
export class SessionHost {
  private readonly options: SessionHostOptions
  private session: LiveSession | null = null
  private activeConfig: SessionConfig | null = null
  // start and stop run one at a time, in call order
  private pending: Promise<unknown> = Promise.resolve()

  constructor(options: SessionHostOptions) {
    this.options = options
  }

  get running(): boolean {
    return this.session?.state.running ?? false
  }

  get config(): SessionConfig | null {
    return this.activeConfig
  }

  private serial<T>(op: () => Promise<T>): Promise<T> {
    const run = this.pending.then(op)
    this.pending = run.catch(() => undefined)
    return run
  }

  /**
   * Replace any halted session with a new one and start it. Resolves false,
   * leaving the current session alone, when one is still running.
   * Configuration errors reject before anything is opened.
   */
  start(config: SessionConfig): Promise<boolean> {
    return this.serial(async () => {
      if (this.running) return false

      const volumeLitres = configVolumeLitres(config)
      const report = configReportOptions(config)

      await this.release()

      const driver = new RegressionDriver(this.options.openSource(), {
        volumeLitres,
        temperatureK: config.temperatureK,
        pressurePa: config.pressurePa,
        report,
        windowSize: config.regressionWindow,
        intervalSeconds: config.acquisitionIntervalS,
        smoothing: config.smoothing,
        regression: config.regression,
        now: this.options.now,
        onReadError: (err) =>
          this.options.logger.warn('sensor_read_failed', {
            error: err instanceof Error ? err.message : String(err),
          }),
      })

      const session = new LiveSession({
        driver,
        intervalSeconds: config.acquisitionIntervalS,
        windowMinutes: config.windowMinutes,
        displaySpanMinutes: config.displaySpanMinutes,
        areaBasis: config.areaBasis,
        logger: this.options.logger,
      })
      session.start()
      this.session = session
      this.activeConfig = config
      return true
    })
  }

  /** Stop and release the current session. False when there is none. */
  stop(): Promise<boolean> {
    return this.serial(() => this.release())
  }

  private async release(): Promise<boolean> {
    const session = this.session
    if (session === null) return false
    this.session = null
    this.activeConfig = null
    await session.stop()
    return true
  }

  reset(): boolean {
    if (this.session === null) return false
    this.session.reset()
    return true
  }

  frame(): LiveFrame | null {
    return this.session?.frame() ?? null
  }

  summary(): SessionSummary | null {
    if (this.session === null) return null
    const { state } = this.session
    return {
      running: state.running,
      ticks: state.ticks,
      failedTicks: state.failedTicks,
      bufferedSamples: state.buffer.length,
      error: state.error,
    }
  }
}
