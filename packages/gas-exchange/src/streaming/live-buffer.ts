// ---------------------------------------------------------------------------
// Live Buffer: bounded FIFO of recent flux samples
// ---------------------------------------------------------------------------
// Fixed-capacity ring: capacity = ⌊window·60 / interval⌋, at least 1.
// Append-only at the back, oldest evicted first, never reordered.
// Single writer (the session tick); readers take a frozen snapshot.
// Also holds the raw readings behind the regression window.

import type { FluxSample, LiveBufferConfig } from '../types.js';

/**
 * Capacity for a real-time window sampled at a fixed interval.
 */
export function windowCapacity(windowMinutes: number, intervalSeconds: number): number {
  const cap = Math.floor((windowMinutes * 60) / intervalSeconds);
  return Number.isFinite(cap) ? Math.max(1, cap) : 1;
}

function resolveCapacity(config: LiveBufferConfig): number {
  if (config.capacity !== undefined) return Math.max(1, Math.floor(config.capacity));
  return windowCapacity(config.windowMinutes ?? 10, config.intervalSeconds ?? 1);
}

export class LiveBuffer<T = FluxSample> {
  private readonly cap: number;
  private readonly slots: (T | undefined)[];
  private head: number;
  private count: number;

  constructor(config: LiveBufferConfig) {
    this.cap = resolveCapacity(config);
    this.slots = new Array<T | undefined>(this.cap).fill(undefined);
    this.head = 0;
    this.count = 0;
  }

  /**
   * Push to the back. When full, the oldest sample is overwritten.
   */
  append(sample: T): void {
    const tail = (this.head + this.count) % this.cap;
    this.slots[tail] = sample;
    if (this.count < this.cap) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.cap;
    }
  }

  /**
   * Ordered read-only copy, oldest first.
   */
  snapshot(): readonly T[] {
    const out: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const sample = this.slots[(this.head + i) % this.cap];
      if (sample !== undefined) out.push(sample);
    }
    return Object.freeze(out);
  }

  latest(): T | undefined {
    if (this.count === 0) return undefined;
    return this.slots[(this.head + this.count - 1) % this.cap];
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }

  get length(): number {
    return this.count;
  }

  get capacity(): number {
    return this.cap;
  }
}
