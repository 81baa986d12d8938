/**
 * Score Blending Service
 *
 * Blends judge quality and response latency into one incentive value:
 *   total = latencyBonus x 0.3 + quality x 100 x 0.7      (0-100)
 *
 * The latency bonus is only paid when quality exceeds 0.2:
 *   < 10s -> 100, < 20s -> 50, < 30s -> 20, otherwise 0
 */

import { Candidate, ScoreRecord, WorkerId } from './types';
import { hasOutput, clampScore } from './BatchScoringService';

export interface LatencyTier {
  belowSeconds: number;
  bonus: number;
}

export const LATENCY_TIERS: readonly LatencyTier[] = [
  { belowSeconds: 10, bonus: 100 },
  { belowSeconds: 20, bonus: 50 },
  { belowSeconds: 30, bonus: 20 },
];

export interface BlendedRound {
  records: ScoreRecord[];                 // One per candidate with output
  incentives: Map<WorkerId, number>;      // One per candidate
}

export class ScoreBlendingService {
  private readonly QUALITY_WEIGHT = 0.7;
  private readonly LATENCY_WEIGHT = 0.3;
  private readonly LATENCY_BONUS_MIN_QUALITY = 0.2;
  private readonly MAX_INCENTIVE = 100;

  /**
   * Tier bonus for a latency, before weighting
   */
  latencyBonus(latencySeconds: number, qualityScore: number): number {
    if (!(qualityScore > this.LATENCY_BONUS_MIN_QUALITY) || !Number.isFinite(latencySeconds) || latencySeconds < 0) {
      return 0;
    }
    const tier = LATENCY_TIERS.find((candidate) => latencySeconds < candidate.belowSeconds);
    return tier ? tier.bonus : 0;
  }

  /**
   * Blended incentive for one candidate. Unrewarded candidates get 0.
   */
  blend(candidate: Candidate, qualityScore: number | null | undefined): number {
    return this.buildRecord(candidate, qualityScore)?.total ?? 0;
  }

  /**
   * Full score record, or null when the candidate has no output
   */
  buildRecord(candidate: Candidate, qualityScore: number | null | undefined): ScoreRecord | null {
    if (!hasOutput(candidate)) {
      return null;
    }

    // Missing, non-finite or non-positive quality earns nothing at all
    const quality = clampScore(qualityScore);
    const latencyBonus = this.latencyBonus(candidate.latencySeconds, quality);
    const latencyContribution = latencyBonus * this.LATENCY_WEIGHT;
    const qualityContribution = quality * 100 * this.QUALITY_WEIGHT;

    return {
      workerId: candidate.workerId,
      qualityScore: quality,
      latencySeconds: candidate.latencySeconds,
      latencyBonus,
      latencyContribution,
      qualityContribution,
      total: Math.min(this.MAX_INCENTIVE, latencyContribution + qualityContribution),
    };
  }

  /**
   * Blend a whole round. Candidates missing from `qualityScores` count as 0.
   */
  blendRound(candidates: Candidate[], qualityScores: Map<WorkerId, number>): BlendedRound {
    const records: ScoreRecord[] = [];
    const incentives = new Map<WorkerId, number>();

    for (const candidate of candidates) {
      const record = this.buildRecord(candidate, qualityScores.get(candidate.workerId));
      if (record) {
        records.push(record);
      }
      incentives.set(candidate.workerId, record ? record.total : 0);
    }

    return { records, incentives };
  }
}
