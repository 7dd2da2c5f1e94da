import { describe, it, expect } from 'vitest';
import { TickScheduler } from './scheduler.ts';

/** Test suite label for the fixed-timestep driver. */
const SUITE = 'scheduler.ts';

describe(SUITE, () => {
  it('accumulates partial steps until a whole tick is due', () => {
    let ticks = 0;
    const scheduler = new TickScheduler(0.25, () => ticks++);
    expect(scheduler.advance(0.1)).toBe(0);
    expect(scheduler.advance(0.2)).toBe(1);
    expect(ticks).toBe(1);
    expect(scheduler.pendingSeconds).toBeCloseTo(0.05, 10);
  });

  it('catches up without skipping ticks', () => {
    let ticks = 0;
    const scheduler = new TickScheduler(0.25, () => ticks++);
    expect(scheduler.advance(1.1)).toBe(4);
    expect(ticks).toBe(4);
  });

  it('ignores negative and non-finite elapsed time', () => {
    const scheduler = new TickScheduler(0.25, () => undefined);
    expect(scheduler.advance(-5)).toBe(0);
    expect(scheduler.advance(Number.NaN)).toBe(0);
    expect(scheduler.advance(Number.POSITIVE_INFINITY)).toBe(0);
    expect(scheduler.pendingSeconds).toBe(0);
  });

  it('floors the tick duration at 10ms', () => {
    const scheduler = new TickScheduler(0, () => undefined);
    expect(scheduler.advance(0.105)).toBe(10);
  });

  it('reset drops pending time', () => {
    const scheduler = new TickScheduler(0.25, () => undefined);
    scheduler.advance(0.2);
    scheduler.reset();
    expect(scheduler.advance(0.1)).toBe(0);
  });
});
