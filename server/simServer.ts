import { performance } from 'node:perf_hooks';
import type { ColonySimulation } from '../src/colony.ts';
import type { Logger } from '../src/logger.ts';
import { TickScheduler } from '../src/scheduler.ts';
import type { ServerConfig } from './config.ts';
import type { StatusMsg } from './protocol.ts';
import type { WsHub } from './wsHub.ts';

/** Longest the loop sleeps between checks, in ms. */
const MAX_LOOP_DELAY_MS = 50;

/** Server-side simulation loop and WS broadcasting. */
export class SimServer {
  /** Colony driven by this server. */
  private colony: ColonySimulation;
  /** WebSocket hub for status broadcasts. */
  private wsHub: WsHub;
  private logger: Logger;
  /** Fixed-timestep driver for colony ticks. */
  private scheduler: TickScheduler;
  /** Simulated seconds per wall-clock second. */
  private simSpeed: number;
  /** Status broadcast rate in hertz. */
  private statusRateHz: number;
  /** Ticks run since start. */
  private tickId = 0;
  /** Whether the main loop is running. */
  private running = false;
  /** Active timer id for the scheduled loop. */
  private timer: ReturnType<typeof setTimeout> | null = null;
  /** Timestamp of the previous loop iteration in ms. */
  private lastLoopAt = 0;
  /** Timestamp of the last status message in ms. */
  private lastStatusSentAt = 0;
  /** Highest generation already broadcast. */
  private lastReportedGeneration = 0;

  constructor(config: ServerConfig, colony: ColonySimulation, wsHub: WsHub, logger: Logger) {
    this.colony = colony;
    this.wsHub = wsHub;
    this.logger = logger;
    this.simSpeed = config.simSpeed;
    this.statusRateHz = config.statusRateHz;
    this.scheduler = new TickScheduler(colony.config.tickSeconds, () => {
      this.colony.tick();
      this.tickId++;
    });
  }

  /** Start the server tick loop. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.lastLoopAt = performance.now();
    this.lastStatusSentAt = 0;
    this.loop();
  }

  /** Stop the server tick loop. */
  stop(): void {
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }

  getTickId(): number {
    return this.tickId;
  }

  getColony(): ColonySimulation {
    return this.colony;
  }

  buildStatus(): StatusMsg {
    return { type: 'status', tick: this.tickId, ...this.colony.getStatus() };
  }

  /** Main timer loop: advance the scheduler by scaled wall time, then publish. */
  private loop(): void {
    if (!this.running) return;
    const now = performance.now();
    const elapsed = ((now - this.lastLoopAt) / 1000) * this.simSpeed;
    this.lastLoopAt = now;
    try {
      this.scheduler.advance(elapsed);
    } catch (err) {
      this.logger.error('sim', `tick failed: ${err instanceof Error ? err.message : String(err)}`);
      this.stop();
      return;
    }
    this.publishGenerations();

    const statusInterval = 1000 / this.statusRateHz;
    if (now - this.lastStatusSentAt >= statusInterval) {
      this.lastStatusSentAt = now;
      this.wsHub.broadcast(this.buildStatus());
    }

    const tickInterval = (this.colony.config.tickSeconds * 1000) / this.simSpeed;
    const delay = Math.max(1, Math.min(MAX_LOOP_DELAY_MS, tickInterval, statusInterval));
    this.timer = setTimeout(() => this.loop(), delay);
  }

  /** Broadcasts every finished generation not yet sent. */
  private publishGenerations(): void {
    for (const summary of this.colony.history) {
      if (summary.generation <= this.lastReportedGeneration) continue;
      this.lastReportedGeneration = summary.generation;
      this.wsHub.broadcast({ type: 'generation', summary });
    }
  }
}
