/**
 * Evaluation Ledger Service
 *
 * In-process sink for round reports. Keeps running per-worker aggregates for
 * the leaderboard and summary statistics of the latest round.
 */

import { ILogger, ConsoleLogger } from './utils/ILogger';
import { IEvaluationSink } from './interfaces/IEvaluationSink';
import { RoundReport, WorkerId } from './types';

export interface LeaderboardEntry {
  workerId: WorkerId;
  averageTotal: number;                 // Over scored responses
  averageQualityContribution: number;
  averageLatencySeconds: number;
  requestCount: number;                 // Rounds the worker was dispatched in
  successCount: number;                 // Rounds the worker returned an output
  lastSeen: number;                     // Unix ms of the last round it was dispatched in
}

export interface RoundSummary {
  roundId: number;
  requestId: string;
  responders: number;
  dispatched: number;
  mean: number;
  min: number;
  max: number;
  std: number;
  completedAt: number;
}

export interface LiveMetrics {
  roundsCompleted: number;
  roundsSkipped: number;
  workersSeen: number;
  lastRound: RoundSummary | null;
}

interface WorkerAggregate {
  totalSum: number;
  qualityContributionSum: number;
  latencySum: number;
  requestCount: number;
  successCount: number;
  lastSeen: number;
}

export function summarize(values: number[]): { mean: number; min: number; max: number; std: number } {
  if (values.length === 0) {
    return { mean: 0, min: 0, max: 0, std: 0 };
  }
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  const variance = values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / values.length;
  return {
    mean,
    min: Math.min(...values),
    max: Math.max(...values),
    std: Math.sqrt(variance),
  };
}

export class EvaluationLedgerService implements IEvaluationSink {
  private logger: ILogger;
  private readonly DEFAULT_LEADERBOARD_LIMIT = 20;
  private workers: Map<WorkerId, WorkerAggregate> = new Map();
  private roundsCompleted = 0;
  private roundsSkipped = 0;
  private lastRound: RoundSummary | null = null;

  constructor(logger?: ILogger) {
    this.logger = logger || new ConsoleLogger('EvaluationLedgerService');
  }

  async recordRound(report: RoundReport): Promise<void> {
    if (report.status === 'skipped') {
      this.roundsSkipped++;
      return;
    }

    this.roundsCompleted++;

    for (const candidate of report.candidates) {
      const aggregate = this.aggregateFor(candidate.workerId);
      aggregate.requestCount++;
      aggregate.lastSeen = report.completedAt;
    }

    for (const record of report.records) {
      const aggregate = this.aggregateFor(record.workerId);
      aggregate.successCount++;
      aggregate.totalSum += record.total;
      aggregate.qualityContributionSum += record.qualityContribution;
      aggregate.latencySum += record.latencySeconds;
    }

    const stats = summarize(report.records.map((record) => record.total));
    this.lastRound = {
      roundId: report.round.roundId,
      requestId: report.round.requestId,
      responders: report.records.length,
      dispatched: report.candidates.length,
      ...stats,
      completedAt: report.completedAt,
    };

    this.logger.info('Round recorded', {
      roundId: report.round.roundId,
      responders: report.records.length,
      mean: Number(stats.mean.toFixed(2)),
      max: Number(stats.max.toFixed(2)),
    });
  }

  /**
   * Workers ordered by average total, best first
   */
  getLeaderboard(limit: number = this.DEFAULT_LEADERBOARD_LIMIT): LeaderboardEntry[] {
    const entries: LeaderboardEntry[] = [];

    for (const [workerId, aggregate] of this.workers) {
      const divisor = aggregate.successCount || 1;
      entries.push({
        workerId,
        averageTotal: aggregate.totalSum / divisor,
        averageQualityContribution: aggregate.qualityContributionSum / divisor,
        averageLatencySeconds: aggregate.latencySum / divisor,
        requestCount: aggregate.requestCount,
        successCount: aggregate.successCount,
        lastSeen: aggregate.lastSeen,
      });
    }

    entries.sort((a, b) => b.averageTotal - a.averageTotal || a.workerId.localeCompare(b.workerId));
    return entries.slice(0, Math.max(0, limit));
  }

  getLiveMetrics(): LiveMetrics {
    return {
      roundsCompleted: this.roundsCompleted,
      roundsSkipped: this.roundsSkipped,
      workersSeen: this.workers.size,
      lastRound: this.lastRound ? { ...this.lastRound } : null,
    };
  }

  private aggregateFor(workerId: WorkerId): WorkerAggregate {
    let aggregate = this.workers.get(workerId);
    if (!aggregate) {
      aggregate = {
        totalSum: 0,
        qualityContributionSum: 0,
        latencySum: 0,
        requestCount: 0,
        successCount: 0,
        lastSeen: 0,
      };
      this.workers.set(workerId, aggregate);
    }
    return aggregate;
  }
}
