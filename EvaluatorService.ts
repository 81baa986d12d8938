/**
 * Evaluator Service
 *
 * Runs one evaluation round:
 * 1. Draw a prompt and generate the reference answer
 * 2. Sample workers and fan the prompt out under one shared timeout
 * 3. Score candidates with the batch scorer
 * 4. Blend quality and latency into per-worker incentives
 * 5. Fold incentives into reputation and report the round
 *
 * Nothing in a round is fatal: failures degrade to absent candidates,
 * zero scores or a skipped round.
 */

import { ulid } from 'ulid';
import { ILogger, ConsoleLogger } from './utils/ILogger';
import { IPeerTransport } from './interfaces/IPeerTransport';
import { IReferenceGenerator } from './interfaces/IInferenceEngine';
import { IReputationUpdater } from './interfaces/IReputationStore';
import { IEvaluationSink } from './interfaces/IEvaluationSink';
import { IPromptSource } from './interfaces/IPromptSource';
import { Candidate, Round, RoundReport, WorkerId, WorkerRequest, WorkerResponse } from './types';
import { BatchScoringService } from './BatchScoringService';
import { ScoreBlendingService } from './ScoreBlendingService';

export interface EvaluatorConfig {
  sampleSize: number;           // Workers queried per round
  dispatchTimeoutMs: number;    // Shared deadline for all replies
}

export const DEFAULT_EVALUATOR_CONFIG: EvaluatorConfig = {
  sampleSize: 50,
  dispatchTimeoutMs: 500_000,
};

export interface EvaluatorDependencies {
  promptSource: IPromptSource;
  referenceGenerator: IReferenceGenerator;
  transport: IPeerTransport;
  scorer: BatchScoringService;
  blender?: ScoreBlendingService;
  reputation: IReputationUpdater;
  sink?: IEvaluationSink;
  random?: () => number;
  now?: () => number;
}

const TIMED_OUT = Symbol('timed-out');

export class EvaluatorService {
  private logger: ILogger;
  private config: EvaluatorConfig;
  private roundCounter = 0;
  private readonly deps: EvaluatorDependencies;
  private readonly blender: ScoreBlendingService;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(dependencies: EvaluatorDependencies, config: Partial<EvaluatorConfig> = {}, logger?: ILogger) {
    this.logger = logger || new ConsoleLogger('EvaluatorService');
    this.config = { ...DEFAULT_EVALUATOR_CONFIG, ...config };
    this.deps = dependencies;
    this.blender = dependencies.blender || new ScoreBlendingService();
    this.random = dependencies.random || (() => Math.random());
    this.now = dependencies.now || (() => Date.now());
  }

  /**
   * Run one round end to end. Never rejects.
   */
  async runRound(): Promise<RoundReport> {
    const roundId = ++this.roundCounter;
    const requestId = `req_${ulid()}`;
    const round: Round = {
      roundId,
      requestId,
      prompt: '',
      referenceAnswer: '',
      workerIds: [],
      createdAt: this.now(),
    };

    try {
      round.prompt = await this.deps.promptSource.next();
      round.referenceAnswer = await this.deps.referenceGenerator.generate(round.prompt);
    } catch (error) {
      return this.skip(round, `Reference generation failed: ${error instanceof Error ? error.message : String(error)}`);
    }

    try {
      round.workerIds = await this.sampleWorkers();
    } catch (error) {
      return this.skip(round, `Worker sampling failed: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (round.workerIds.length === 0) {
      return this.skip(round, 'No workers available');
    }

    this.logger.info('Round started', {
      roundId,
      requestId,
      workers: round.workerIds.length,
      prompt: round.prompt,
    });

    const candidates = await this.dispatch(round);
    const received = candidates.filter((candidate) => candidate.output !== null).length;
    this.logger.info('Received responses', { roundId, received, dispatched: candidates.length });

    const qualityScores = await this.deps.scorer.scoreAll(round.prompt, round.referenceAnswer, candidates);
    const { records, incentives } = this.blender.blendRound(candidates, qualityScores);

    try {
      await this.deps.reputation.applyIncentives(incentives);
    } catch (error) {
      this.logger.error('Reputation update failed', {
        roundId,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    const report: RoundReport = {
      round,
      status: 'completed',
      candidates,
      qualityScores,
      records,
      incentives,
      completedAt: this.now(),
    };

    if (records.length === 0) {
      this.logger.warn('No rewarded responses this round', { roundId, requestId });
    }
    await this.report(report);

    return report;
  }

  /**
   * Parallel fan-out with one shared deadline. Late, failed or empty replies
   * become absent candidates; latency is measured here, not by the worker.
   */
  async dispatch(round: Round): Promise<Candidate[]> {
    const controller = new AbortController();
    const request: WorkerRequest = { prompt: round.prompt, requestId: round.requestId };
    const startedAt = this.now();

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve(TIMED_OUT);
      }, this.config.dispatchTimeoutMs);
    });

    const replies = round.workerIds.map(async (workerId): Promise<Candidate> => {
      try {
        const reply: WorkerResponse | typeof TIMED_OUT = await Promise.race([
          this.deps.transport.send(workerId, request, {
            signal: controller.signal,
            timeoutMs: this.config.dispatchTimeoutMs,
          }),
          deadline,
        ]);
        const latencySeconds = (this.now() - startedAt) / 1000;

        if (reply === TIMED_OUT) {
          return { workerId, output: null, latencySeconds, error: 'timeout' };
        }
        if (reply.requestId !== round.requestId) {
          return { workerId, output: null, latencySeconds, error: 'request id mismatch' };
        }
        if (typeof reply.output !== 'string' || reply.output.length === 0) {
          return { workerId, output: null, latencySeconds, error: 'empty output' };
        }
        return { workerId, output: reply.output, latencySeconds };
      } catch (error) {
        return {
          workerId,
          output: null,
          latencySeconds: (this.now() - startedAt) / 1000,
          error: error instanceof Error ? error.message : String(error),
        };
      }
    });

    try {
      return await Promise.all(replies);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Up to sampleSize unique workers, uniformly at random
   */
  async sampleWorkers(): Promise<WorkerId[]> {
    const available = Array.from(new Set(await this.deps.transport.getAvailableWorkers()));
    const count = Math.min(this.config.sampleSize, available.length);

    for (let i = 0; i < count; i++) {
      const j = i + Math.min(available.length - i - 1, Math.floor(this.random() * (available.length - i)));
      [available[i], available[j]] = [available[j], available[i]];
    }

    return available.slice(0, count);
  }

  getRoundCount(): number {
    return this.roundCounter;
  }

  private async skip(round: Round, reason: string): Promise<RoundReport> {
    this.logger.warn('Round skipped', { roundId: round.roundId, reason });
    const report: RoundReport = {
      round,
      status: 'skipped',
      skipReason: reason,
      candidates: [],
      qualityScores: new Map(),
      records: [],
      incentives: new Map(),
      completedAt: this.now(),
    };
    await this.report(report);
    return report;
  }

  private async report(report: RoundReport): Promise<void> {
    if (!this.deps.sink) {
      return;
    }
    try {
      await this.deps.sink.recordRound(report);
    } catch (error) {
      this.logger.error('Failed to record round', {
        roundId: report.round.roundId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
