// ---------------------------------------------------------------------------
// Live Session Tests
// ---------------------------------------------------------------------------
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { LiveSession, type SessionLogger } from '../session/live-session.js';
import type { AcquisitionDriver } from '../acquisition/driver.js';
import { GasExchangeError } from '../errors.js';
import type { TickRecord } from '../types.js';

function record(elapsedMin: number, anet: number): TickRecord {
  return { elapsedMin, co2: 410, anet, anetLower: anet - 0.5, anetUpper: anet + 0.5 };
}

/** Driver that replays a script of results, then keeps returning null. */
function scriptedDriver(script: Array<TickRecord | null | Error>): AcquisitionDriver & { close: () => void } {
  let i = 0;
  return {
    read: async () => {
      const next = i < script.length ? script[i++]! : null;
      if (next instanceof Error) throw next;
      return next;
    },
    close: vi.fn(),
  };
}

function recordingLogger(): SessionLogger & { events: string[] } {
  const events: string[] = [];
  return {
    events,
    info: (event) => { events.push(event); },
    warn: (event) => { events.push(event); },
    error: (event) => { events.push(event); },
  };
}

describe('LiveSession', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('appends one sample per tick at the configured interval', async () => {
    const driver = scriptedDriver([null, record(0.05, 1.2), record(0.07, 1.4)]);
    const session = new LiveSession({ driver, intervalSeconds: 1, windowMinutes: 10, areaBasis: true });
    session.start();

    await vi.advanceTimersByTimeAsync(3000);

    expect(session.state.ticks).toBe(3);
    expect(session.state.buffer.snapshot().map((s) => s.flux)).toEqual([1.2, 1.4]);
    expect(session.state.latestAnet).toBe(1.4);
    expect(session.state.latestCo2).toBe(410);
    await session.stop();
  });

  it('bounds the buffer by window over interval', async () => {
    const script = Array.from({ length: 8 }, (_, i) => record(i / 60, i));
    const session = new LiveSession({
      driver: scriptedDriver(script),
      intervalSeconds: 30,
      windowMinutes: 2,
      areaBasis: false,
    });
    for (let i = 0; i < 8; i++) await session.tick();

    expect(session.state.buffer.capacity).toBe(4);
    expect(session.state.buffer.snapshot().map((s) => s.flux)).toEqual([4, 5, 6, 7]);
  });

  it('skips failed ticks and keeps running', async () => {
    const logger = recordingLogger();
    const driver = scriptedDriver([
      record(0.1, 1),
      new GasExchangeError('AcquisitionFailure', 'read timeout'),
      new Error('unexpected frame'),
      record(0.2, 2),
    ]);
    const session = new LiveSession({ driver, intervalSeconds: 1, windowMinutes: 10, areaBasis: false, logger });
    session.start();

    await vi.advanceTimersByTimeAsync(4000);

    expect(session.state.failedTicks).toBe(2);
    expect(session.state.running).toBe(true);
    expect(session.state.buffer.length).toBe(2);
    expect(logger.events.filter((e) => e === 'acquisition_failure')).toHaveLength(2);
    await session.stop();
  });

  it('stops on an unavailable source and keeps the message', async () => {
    const driver = scriptedDriver([new GasExchangeError('SourceUnavailable', 'no datalog found')]);
    const session = new LiveSession({ driver, intervalSeconds: 1, windowMinutes: 10, areaBasis: false });
    session.start();

    await vi.advanceTimersByTimeAsync(5000);

    expect(session.state.ticks).toBe(1);
    expect(session.state.running).toBe(false);
    expect(session.frame().error).toBe('no datalog found');
  });

  it('never runs two reads at once', async () => {
    let release: (value: TickRecord) => void = () => undefined;
    const driver: AcquisitionDriver = {
      read: vi.fn(() => new Promise<TickRecord>((resolve) => { release = resolve; })),
    };
    const session = new LiveSession({ driver, intervalSeconds: 1, windowMinutes: 10, areaBasis: false });

    const first = session.tick();
    const second = session.tick();
    release(record(0.1, 3));
    await Promise.all([first, second]);

    expect(driver.read).toHaveBeenCalledTimes(1);
    expect(session.state.overlappedTicks).toBe(1);
    expect(session.state.buffer.length).toBe(1);
  });

  it('stops the timer and closes the driver', async () => {
    const driver = scriptedDriver([record(0.1, 1)]);
    const session = new LiveSession({ driver, intervalSeconds: 1, windowMinutes: 10, areaBasis: false });
    session.start();
    await session.stop();
    await vi.advanceTimersByTimeAsync(3000);

    expect(session.state.ticks).toBe(0);
    expect(session.state.running).toBe(false);
    expect(driver.close).toHaveBeenCalledTimes(1);
  });

  it('renders a frame from the current snapshot', async () => {
    const driver = scriptedDriver([record(0.5, 1.234), record(1.5, -0.5)]);
    const session = new LiveSession({ driver, intervalSeconds: 1, windowMinutes: 10, areaBasis: true });

    expect(session.frame()).toMatchObject({ window: null, co2Text: 'Waiting for CO2 data...', anetText: '' });

    await session.tick();
    await session.tick();
    const frame = session.frame();

    expect(frame.co2Text).toBe('CO₂ = 410 ppm');
    expect(frame.anetText).toBe('A_net = -0.50 μmol m⁻² s⁻¹');
    expect(frame.window!.xRange).toEqual([0, 10]);
    // band -1.0 .. 1.734, span 2.734, 10% padding
    expect(frame.window!.yRange[0]).toBeCloseTo(-1.2734, 9);
    expect(frame.window!.yRange[1]).toBeCloseTo(2.0074, 9);
  });

  it('resets buffer and readings', async () => {
    const session = new LiveSession({
      driver: scriptedDriver([record(0.1, 1)]),
      intervalSeconds: 1,
      windowMinutes: 10,
      areaBasis: false,
    });
    await session.tick();
    session.reset();

    expect(session.state.buffer.length).toBe(0);
    expect(session.frame().co2Text).toBe('Waiting for CO2 data...');
  });
});
