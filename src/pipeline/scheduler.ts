/**
 * Herald: Scheduler
 *
 * Fixed-rate trigger around runCycle. One cycle at a time: a trigger that
 * fires while a cycle is still running is skipped and counted.
 *
 *   idle ──start()──▶ running ──stop()──▶ stopped
 */

import type { CycleResult } from '../types';
import { errorMessage, logger } from '../lib/logger';

export type SchedulerState = 'idle' | 'running' | 'stopped';

export interface SchedulerOptions {
  intervalMs: number;
  /** Runs one cycle; the signal aborts on stop() */
  runCycle: (signal: AbortSignal) => Promise<CycleResult>;
  /** Sent once before the first cycle */
  announce?: () => Promise<void>;
}

export class Scheduler {
  private readonly intervalMs: number;
  private readonly cycle: SchedulerOptions['runCycle'];
  private readonly announce?: SchedulerOptions['announce'];
  private readonly log = logger.child({ component: 'scheduler' });

  private currentState: SchedulerState = 'idle';
  private timer?: NodeJS.Timeout;
  private inFlight?: Promise<void>;
  private controller = new AbortController();
  private skipped = 0;
  private cycles = 0;
  private last?: CycleResult;

  constructor(options: SchedulerOptions) {
    this.intervalMs = options.intervalMs;
    this.cycle = options.runCycle;
    this.announce = options.announce;
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  get lastResult(): CycleResult | undefined {
    return this.last;
  }

  get skippedTriggers(): number {
    return this.skipped;
  }

  get completedCycles(): number {
    return this.cycles;
  }

  get cycleInProgress(): boolean {
    return this.inFlight !== undefined;
  }

  /**
   * Announce (if configured), run the first cycle, then arm the timer.
   * Resolves once the first cycle has finished.
   */
  async start(): Promise<void> {
    if (this.currentState !== 'idle') {
      throw new Error(`Scheduler cannot start from state ${this.currentState}`);
    }
    this.currentState = 'running';
    this.log.info('Scheduler started', { intervalMs: this.intervalMs });

    if (this.announce) {
      try {
        await this.announce();
      } catch (error) {
        this.log.error('Startup announcement failed', { error: errorMessage(error) });
      }
    }

    // stop() may have been called during the announcement
    if (this.isStopped()) return;

    this.timer = setInterval(() => this.trigger(), this.intervalMs);
    await this.runGuarded();
  }

  /**
   * Clear the timer, abort pending deliveries and wait for the in-flight
   * cycle to settle.
   */
  async stop(): Promise<void> {
    if (this.currentState === 'stopped') return;
    this.currentState = 'stopped';

    clearInterval(this.timer);
    this.timer = undefined;
    this.controller.abort();

    if (this.inFlight) {
      this.log.info('Waiting for in-flight cycle to finish');
      await this.inFlight;
    }
    this.log.info('Scheduler stopped', { cycles: this.cycles, skippedTriggers: this.skipped });
  }

  private isStopped(): boolean {
    return this.currentState === 'stopped';
  }

  private trigger(): void {
    if (this.isStopped()) return;
    if (this.inFlight) {
      this.skipped += 1;
      this.log.warn('Previous cycle still running, skipping trigger', { skippedTriggers: this.skipped });
      return;
    }
    void this.runGuarded();
  }

  private runGuarded(): Promise<void> {
    if (this.inFlight) return this.inFlight;

    const run = this.cycle(this.controller.signal)
      .then(result => {
        this.last = result;
        this.cycles += 1;
      })
      .catch((error: unknown) => {
        this.log.error('Cycle failed', { error: errorMessage(error) });
      })
      .finally(() => {
        this.inFlight = undefined;
      });

    this.inFlight = run;
    return run;
  }
}
