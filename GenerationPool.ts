/**
 * Generation Pool
 *
 * Bounded executor for model inference. At most `maxWorkers` jobs run at once;
 * the rest wait in FIFO order. The request-handling path awaits its own job only.
 */

import { ILogger, ConsoleLogger } from './utils/ILogger';

interface QueuedJob {
  start: () => void;
}

export class GenerationPool {
  private logger: ILogger;
  private active = 0;
  private queue: QueuedJob[] = [];
  private completed = 0;

  constructor(private readonly maxWorkers: number = 4, logger?: ILogger) {
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new Error(`Generation pool needs at least one worker, got ${maxWorkers}`);
    }
    this.logger = logger || new ConsoleLogger('GenerationPool');
  }

  /**
   * Run a job once a slot is free
   */
  run<T>(job: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = () => {
        this.active++;
        void Promise.resolve()
          .then(job)
          .then(resolve, reject)
          .finally(() => {
            this.active--;
            this.completed++;
            this.next();
          });
      };

      if (this.active < this.maxWorkers) {
        start();
      } else {
        this.queue.push({ start });
        this.logger.debug('Generation job queued', { queued: this.queue.length, active: this.active });
      }
    });
  }

  getStats(): { active: number; queued: number; completed: number; maxWorkers: number } {
    return {
      active: this.active,
      queued: this.queue.length,
      completed: this.completed,
      maxWorkers: this.maxWorkers,
    };
  }

  private next(): void {
    const job = this.queue.shift();
    if (job) {
      job.start();
    }
  }
}
