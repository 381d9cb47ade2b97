// ---------------------------------------------------------------------------
// Live session controller
// ---------------------------------------------------------------------------
// One interval timer drives tick → driver.read → buffer.append. Ticks never
// overlap: one that fires while the previous read is still pending is
// counted and dropped. Rendering reads a frozen snapshot of SessionState.
//
// Failure policy per tick:
//   AcquisitionFailure / anything unexpected → logged, no sample, loop continues
//   SourceUnavailable                        → session stops, error kept for display

import { isGasExchangeError } from '../errors.js';
import type { AcquisitionDriver } from '../acquisition/driver.js';
import { computeDisplayWindow } from '../streaming/display-window.js';
import { LiveBuffer } from '../streaming/live-buffer.js';
import { formatAnet, formatCo2 } from '../readout.js';
import type { DisplayWindow, FluxSample } from '../types.js';

type LogFields = Record<string, unknown>;

export interface SessionLogger {
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
}

const silentLogger: SessionLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export interface LiveSessionOptions {
  driver: AcquisitionDriver;
  intervalSeconds: number;
  /** Real-time span kept in the buffer */
  windowMinutes: number;
  /** Span of the x axis (defaults to windowMinutes) */
  displaySpanMinutes?: number;
  areaBasis: boolean;
  logger?: SessionLogger;
}

export interface SessionState {
  readonly buffer: LiveBuffer;
  latestCo2: number | null;
  latestAnet: number | null;
  ticks: number;
  /** Ticks dropped because the previous one was still running */
  overlappedTicks: number;
  /** Ticks whose read failed */
  failedTicks: number;
  running: boolean;
  error: string | null;
}

export interface LiveFrame {
  window: DisplayWindow | null;
  co2Text: string;
  anetText: string;
  latestCo2: number | null;
  latestAnet: number | null;
  running: boolean;
  error: string | null;
}

export class LiveSession {
  readonly state: SessionState;
  private readonly options: LiveSessionOptions;
  private readonly logger: SessionLogger;
  private timer: ReturnType<typeof setInterval> | null;
  private inFlight: Promise<void> | null;

  constructor(options: LiveSessionOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
    this.state = {
      buffer: new LiveBuffer({
        windowMinutes: options.windowMinutes,
        intervalSeconds: options.intervalSeconds,
      }),
      latestCo2: null,
      latestAnet: null,
      ticks: 0,
      overlappedTicks: 0,
      failedTicks: 0,
      running: false,
      error: null,
    };
    this.timer = null;
    this.inFlight = null;
  }

  start(): void {
    if (this.timer !== null) return;
    this.state.running = true;
    this.state.error = null;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.intervalSeconds * 1000);
    this.logger.info('session_started', {
      intervalSeconds: this.options.intervalSeconds,
      capacity: this.state.buffer.capacity,
    });
  }

  /**
   * Run one acquisition cycle. Never rejects.
   */
  tick(): Promise<void> {
    if (this.inFlight !== null) {
      this.state.overlappedTicks++;
      return this.inFlight;
    }
    this.inFlight = this.runTick().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async runTick(): Promise<void> {
    this.state.ticks++;
    try {
      const record = await this.options.driver.read();
      if (record === null) return;

      const sample: FluxSample = {
        elapsed: record.elapsedMin,
        concentrationPpm: record.co2,
        flux: record.anet,
        fluxLower: record.anetLower,
        fluxUpper: record.anetUpper,
      };
      this.state.buffer.append(sample);
      this.state.latestCo2 = record.co2;
      this.state.latestAnet = record.anet;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (isGasExchangeError(err, 'SourceUnavailable')) {
        this.logger.error('source_unavailable', { error: message });
        this.state.error = message;
        this.halt();
        return;
      }
      this.state.failedTicks++;
      this.logger.warn('acquisition_failure', { error: message, tick: this.state.ticks });
    }
  }

  private halt(): void {
    if (this.timer !== null) clearInterval(this.timer);
    this.timer = null;
    this.state.running = false;
  }

  /**
   * Stop the timer, wait for a pending tick and release the driver.
   */
  async stop(): Promise<void> {
    this.halt();
    if (this.inFlight !== null) await this.inFlight;
    await this.options.driver.close?.();
    this.logger.info('session_stopped', { ticks: this.state.ticks, failedTicks: this.state.failedTicks });
  }

  reset(): void {
    this.state.buffer.clear();
    this.state.latestCo2 = null;
    this.state.latestAnet = null;
  }

  frame(): LiveFrame {
    const snapshot = this.state.buffer.snapshot();
    return {
      window: computeDisplayWindow(
        snapshot,
        this.options.displaySpanMinutes ?? this.options.windowMinutes,
      ),
      co2Text: formatCo2(this.state.latestCo2),
      anetText: formatAnet(this.state.latestAnet, this.options.areaBasis),
      latestCo2: this.state.latestCo2,
      latestAnet: this.state.latestAnet,
      running: this.state.running,
      error: this.state.error,
    };
  }
}
