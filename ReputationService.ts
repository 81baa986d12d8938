/**
 * Reputation Service
 *
 * Folds each round's incentive vector into a persistent per-worker reputation
 * using an exponential moving average:
 *
 *   reputation' = alpha x incentive + (1 - alpha) x reputation
 *
 * Every worker already known to the store is updated each round; a worker
 * missing from the vector counts as an incentive of 0 and decays.
 * Weights for future rounds are the L1-normalized reputations.
 */

import { ILogger, ConsoleLogger } from './utils/ILogger';
import { IReputationStore, IReputationUpdater } from './interfaces/IReputationStore';
import { WorkerId } from './types';

export interface ReputationUpdateResult {
  workerId: WorkerId;
  oldReputation: number;
  newReputation: number;
  incentive: number;
}

export class ReputationService implements IReputationUpdater {
  private logger: ILogger;
  private readonly DEFAULT_ALPHA = 0.1;
  private readonly alpha: number;
  private lastUpdate: ReputationUpdateResult[] = [];

  constructor(private store: IReputationStore, alpha?: number, logger?: ILogger) {
    this.logger = logger || new ConsoleLogger('ReputationService');
    this.alpha = alpha ?? this.DEFAULT_ALPHA;
    if (!(this.alpha > 0 && this.alpha <= 1)) {
      throw new Error(`Reputation alpha must be in (0, 1], got ${this.alpha}`);
    }
  }

  /**
   * Apply one round's incentives
   */
  async applyIncentives(incentives: Map<WorkerId, number>): Promise<void> {
    const current = await this.store.load();
    const workerIds = new Set<WorkerId>([...current.keys(), ...incentives.keys()]);
    const updates = new Map<WorkerId, number>();
    const results: ReputationUpdateResult[] = [];

    for (const workerId of workerIds) {
      const raw = incentives.get(workerId);
      const incentive = typeof raw === 'number' && Number.isFinite(raw) ? raw : 0;
      const oldReputation = current.get(workerId) ?? 0;
      const newReputation = this.alpha * incentive + (1 - this.alpha) * oldReputation;

      updates.set(workerId, newReputation);
      results.push({ workerId, oldReputation, newReputation, incentive });
    }

    await this.store.merge(updates);
    this.lastUpdate = results;

    this.logger.info('Reputation updated', {
      workers: updates.size,
      rewarded: Array.from(incentives.values()).filter((value) => value > 0).length,
    });
  }

  async getReputation(workerId: WorkerId): Promise<number> {
    const current = await this.store.load();
    return current.get(workerId) ?? 0;
  }

  /**
   * L1-normalized reputations. All-zero reputations give all-zero weights.
   */
  async getWeights(): Promise<Map<WorkerId, number>> {
    const current = await this.store.load();
    const total = Array.from(current.values()).reduce((sum, value) => sum + Math.max(0, value), 0);
    const weights = new Map<WorkerId, number>();

    for (const [workerId, value] of current) {
      weights.set(workerId, total > 0 ? Math.max(0, value) / total : 0);
    }

    return weights;
  }

  /**
   * Per-worker changes from the most recent update
   */
  getLastUpdate(): ReputationUpdateResult[] {
    return [...this.lastUpdate];
  }
}
