/**
 * Round Scheduler
 *
 * Drives the evaluator: run one round, wait `intervalMs`, repeat.
 * Rounds never overlap. `stop()` cuts the wait short and resolves once the
 * in-flight round (if any) has finished.
 */

import { ILogger, ConsoleLogger } from './utils/ILogger';
import { RoundReport } from './types';

export interface RoundRunner {
  runRound(): Promise<RoundReport>;
}

export interface RoundSchedulerConfig {
  intervalMs: number;
  maxRounds?: number;         // Stop on its own after this many rounds
}

export const DEFAULT_ROUND_SCHEDULER_CONFIG: RoundSchedulerConfig = {
  intervalMs: 300_000,
};

export class RoundScheduler {
  private logger: ILogger;
  private config: RoundSchedulerConfig;
  private running = false;
  private loop: Promise<void> | null = null;
  private wakeTimer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;
  private roundsRun = 0;

  constructor(
    private runner: RoundRunner,
    config: Partial<RoundSchedulerConfig> = {},
    private onRoundComplete?: (report: RoundReport) => void,
    logger?: ILogger
  ) {
    this.logger = logger || new ConsoleLogger('RoundScheduler');
    this.config = { ...DEFAULT_ROUND_SCHEDULER_CONFIG, ...config };
    if (!(this.config.intervalMs >= 0)) {
      throw new Error(`Round interval must be non-negative, got ${this.config.intervalMs}`);
    }
  }

  /**
   * Start the loop. Calling start on a running scheduler is a no-op.
   */
  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.logger.info('Scheduler started', { intervalMs: this.config.intervalMs });
    this.loop = this.tickLoop();
  }

  /**
   * Stop after the in-flight round
   */
  async stop(): Promise<void> {
    this.running = false;
    this.interruptWait();
    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
  }

  /**
   * Resolves when the loop ends, by stop() or by reaching maxRounds
   */
  async whenStopped(): Promise<void> {
    if (this.loop) {
      await this.loop;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  getRoundsRun(): number {
    return this.roundsRun;
  }

  private async tickLoop(): Promise<void> {
    while (this.running) {
      try {
        const report = await this.runner.runRound();
        if (this.onRoundComplete) {
          this.onRoundComplete(report);
        }
      } catch (error) {
        this.logger.error('Round failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
      this.roundsRun++;

      if (this.config.maxRounds !== undefined && this.roundsRun >= this.config.maxRounds) {
        this.running = false;
        break;
      }
      if (!this.running) {
        break;
      }
      await this.sleep(this.config.intervalMs);
    }
    this.logger.info('Scheduler stopped', { roundsRun: this.roundsRun });
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wake = resolve;
      this.wakeTimer = setTimeout(() => {
        this.wakeTimer = null;
        this.wake = null;
        resolve();
      }, ms);
    });
  }

  private interruptWait(): void {
    if (this.wakeTimer) {
      clearTimeout(this.wakeTimer);
      this.wakeTimer = null;
    }
    if (this.wake) {
      const wake = this.wake;
      this.wake = null;
      wake();
    }
  }
}
