/**
 * EvaluationLedgerService Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { EvaluationLedgerService, summarize } from '../EvaluationLedgerService';
import { Candidate, RoundReport, ScoreRecord } from '../types';
import { silentLogger } from './helpers/fakes';

function record(workerId: string, total: number, qualityContribution: number, latencySeconds: number): ScoreRecord {
  return {
    workerId,
    qualityScore: qualityContribution / 70,
    latencySeconds,
    latencyBonus: 0,
    latencyContribution: total - qualityContribution,
    qualityContribution,
    total,
  };
}

function report(roundId: number, candidates: Candidate[], records: ScoreRecord[], completedAt: number): RoundReport {
  return {
    round: {
      roundId,
      requestId: `req_${roundId}`,
      prompt: 'p',
      referenceAnswer: 'r',
      workerIds: candidates.map((candidate) => candidate.workerId),
      createdAt: completedAt - 1000,
    },
    status: 'completed',
    candidates,
    qualityScores: new Map(),
    records,
    incentives: new Map(records.map((entry) => [entry.workerId, entry.total])),
    completedAt,
  };
}

describe('EvaluationLedgerService', () => {
  let ledger: EvaluationLedgerService;

  beforeEach(async () => {
    ledger = new EvaluationLedgerService(silentLogger());
    await ledger.recordRound(
      report(
        1,
        [
          { workerId: 'a', output: 'A', latencySeconds: 8 },
          { workerId: 'b', output: null, latencySeconds: 30, error: 'timeout' },
        ],
        [record('a', 93, 63, 8)],
        1_000
      )
    );
    await ledger.recordRound(
      report(
        2,
        [
          { workerId: 'a', output: 'A', latencySeconds: 15 },
          { workerId: 'b', output: 'B', latencySeconds: 25 },
        ],
        [record('a', 50, 35, 15), record('b', 27, 21, 25)],
        2_000
      )
    );
  });

  it('should rank workers by average total over scored responses', () => {
    expect(ledger.getLeaderboard()).toEqual([
      {
        workerId: 'a',
        averageTotal: 71.5,
        averageQualityContribution: 49,
        averageLatencySeconds: 11.5,
        requestCount: 2,
        successCount: 2,
        lastSeen: 2_000,
      },
      {
        workerId: 'b',
        averageTotal: 27,
        averageQualityContribution: 21,
        averageLatencySeconds: 25,
        requestCount: 2,
        successCount: 1,
        lastSeen: 2_000,
      },
    ]);
  });

  it('should limit the leaderboard', () => {
    expect(ledger.getLeaderboard(1).map((entry) => entry.workerId)).toEqual(['a']);
  });

  it('should summarize the latest round', () => {
    expect(ledger.getLiveMetrics()).toEqual({
      roundsCompleted: 2,
      roundsSkipped: 0,
      workersSeen: 2,
      lastRound: {
        roundId: 2,
        requestId: 'req_2',
        responders: 2,
        dispatched: 2,
        mean: 38.5,
        min: 27,
        max: 50,
        std: 11.5,
        completedAt: 2_000,
      },
    });
  });

  it('should count skipped rounds without touching aggregates', async () => {
    await ledger.recordRound({ ...report(3, [], [], 3_000), status: 'skipped', skipReason: 'No workers available' });

    const metrics = ledger.getLiveMetrics();
    expect(metrics.roundsSkipped).toBe(1);
    expect(metrics.lastRound?.roundId).toBe(2);
  });

  it('should summarize an empty list as zeros', () => {
    expect(summarize([])).toEqual({ mean: 0, min: 0, max: 0, std: 0 });
  });
});
