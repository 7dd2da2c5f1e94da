/** Smallest tick duration the scheduler accepts, in seconds. */
export const MIN_TICK_SECONDS = 0.01;

/**
 * Fixed-timestep driver.  Elapsed wall time is accumulated and the tick
 * callback runs once per whole tick duration, catching up without skipping.
 */
export class TickScheduler {
  private accumulator = 0;
  private readonly tickSeconds: number;
  private readonly onTick: () => void;

  constructor(tickSeconds: number, onTick: () => void) {
    this.tickSeconds = Math.max(MIN_TICK_SECONDS, tickSeconds);
    this.onTick = onTick;
  }

  get pendingSeconds(): number {
    return this.accumulator;
  }

  /**
   * @param elapsedSeconds - Wall time since the previous call; negative or
   *   non-finite values count as zero.
   * @returns Number of ticks run.
   */
  advance(elapsedSeconds: number): number {
    if (Number.isFinite(elapsedSeconds) && elapsedSeconds > 0) this.accumulator += elapsedSeconds;
    let ticks = 0;
    while (this.accumulator >= this.tickSeconds) {
      this.accumulator -= this.tickSeconds;
      this.onTick();
      ticks++;
    }
    return ticks;
  }

  reset(): void {
    this.accumulator = 0;
  }
}
