/**
 * Batch Scoring Service
 *
 * Splits a round's candidates into judge-oracle calls that fit an input-size
 * budget and reassembles one score per worker, in candidate order.
 *
 * Budget accounting (characters):
 *   avgItemSize  = mean(output.length + FORMATTING_OVERHEAD) over candidates with output
 *   maxBatchSize = floor((inputBudget - prompt.length - reference.length) / avgItemSize) - 1
 *
 * Failure isolation: a batch whose oracle call throws or returns a malformed
 * vector scores 0 for its own members only.
 */

import { ILogger, ConsoleLogger } from './utils/ILogger';
import { IJudgeOracle } from './interfaces/IJudgeOracle';
import { WorkerId } from './types';

export interface ScoringCandidate {
  workerId: WorkerId;
  output: string | null;
}

export interface BatchScoringConfig {
  inputBudget: number;          // Total characters the oracle accepts per call
  formattingOverhead: number;   // Per-candidate characters added by the judge prompt
  forceMinimumBatch: boolean;   // Budget too small: score one candidate per call instead of zeroing
}

export const DEFAULT_BATCH_SCORING_CONFIG: BatchScoringConfig = {
  inputBudget: 8192,
  formattingOverhead: 10,
  forceMinimumBatch: false,
};

export interface BatchPlan {
  averageItemSize: number;
  maxBatchSize: number;
  batches: ScoringCandidate[][];
}

export function hasOutput<T extends { output: string | null }>(candidate: T): candidate is T & { output: string } {
  return typeof candidate.output === 'string' && candidate.output.length > 0;
}

export function clampScore(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return 0;
  }
  return Math.max(0, Math.min(1, value));
}

export class BatchScoringService {
  private logger: ILogger;
  private config: BatchScoringConfig;

  constructor(private judge: IJudgeOracle, config: Partial<BatchScoringConfig> = {}, logger?: ILogger) {
    this.logger = logger || new ConsoleLogger('BatchScoringService');
    this.config = { ...DEFAULT_BATCH_SCORING_CONFIG, ...config };
  }

  /**
   * Score every candidate. The result has an entry for every input worker id.
   */
  async scoreAll(
    prompt: string,
    reference: string,
    candidates: ScoringCandidate[]
  ): Promise<Map<WorkerId, number>> {
    const scores = new Map<WorkerId, number>();
    for (const candidate of candidates) {
      scores.set(candidate.workerId, 0);
    }

    const plan = this.plan(prompt, reference, candidates);
    if (plan.batches.length === 0) {
      return scores;
    }

    for (let i = 0; i < plan.batches.length; i++) {
      const batch = plan.batches[i];
      const batchScores = await this.scoreBatch(prompt, reference, batch, i, plan.batches.length);
      batch.forEach((candidate, index) => {
        scores.set(candidate.workerId, batchScores[index]);
      });
    }

    return scores;
  }

  /**
   * Work out batch boundaries without calling the oracle
   */
  plan(prompt: string, reference: string, candidates: ScoringCandidate[]): BatchPlan {
    const present = candidates.filter(hasOutput);
    if (present.length === 0) {
      this.logger.info('No candidate outputs to score', { candidates: candidates.length });
      return { averageItemSize: 0, maxBatchSize: 0, batches: [] };
    }

    const totalSize = present.reduce(
      (sum, candidate) => sum + candidate.output.length + this.config.formattingOverhead,
      0
    );
    const averageItemSize = totalSize / present.length;
    const available = this.config.inputBudget - prompt.length - reference.length;
    let maxBatchSize = Math.floor(available / averageItemSize) - 1;

    if (maxBatchSize <= 0) {
      if (!this.config.forceMinimumBatch) {
        this.logger.warn('Judge input budget too small for any candidate, scoring round as zero', {
          inputBudget: this.config.inputBudget,
          promptLength: prompt.length,
          referenceLength: reference.length,
          averageItemSize,
          maxBatchSize,
        });
        return { averageItemSize, maxBatchSize, batches: [] };
      }
      this.logger.warn('Judge input budget too small, falling back to single-candidate batches', {
        averageItemSize,
        maxBatchSize,
      });
      maxBatchSize = 1;
    }

    const batches: ScoringCandidate[][] = [];
    for (let start = 0; start < present.length; start += maxBatchSize) {
      batches.push(present.slice(start, start + maxBatchSize));
    }

    return { averageItemSize, maxBatchSize, batches };
  }

  /**
   * Score one batch, zero-filling on any failure
   */
  private async scoreBatch(
    prompt: string,
    reference: string,
    batch: ScoringCandidate[],
    batchIndex: number,
    batchCount: number
  ): Promise<number[]> {
    const zeros = batch.map(() => 0);

    try {
      const result = await this.judge.score({
        prompt,
        reference,
        candidates: batch.map((candidate) => candidate.output ?? ''),
      });

      if (!Array.isArray(result) || result.length !== batch.length) {
        this.logger.error('Judge returned a malformed score vector', {
          batch: batchIndex + 1,
          expected: batch.length,
          received: Array.isArray(result) ? result.length : typeof result,
        });
        return zeros;
      }

      this.logger.info(`Processed batch ${batchIndex + 1}/${batchCount}`, { responses: batch.length });
      return result.map(clampScore);
    } catch (error) {
      this.logger.error('Judge call failed, zero-scoring batch', {
        batch: batchIndex + 1,
        workers: batch.map((candidate) => candidate.workerId),
        error: error instanceof Error ? error.message : String(error),
      });
      return zeros;
    }
  }
}
