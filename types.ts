/**
 * Subnet Types
 *
 * Shared domain types for the evaluator (rounds, candidates, score records)
 * and the worker (prompt classification, response provenance).
 */

export type WorkerId = string;

/**
 * Prompt categories recognised by the worker classifier.
 * `general` is the default when no keyword set matches.
 */
export const PROMPT_CATEGORIES = [
  'anxiety',
  'depression',
  'stress',
  'relationship',
  'sleep',
  'general',
] as const;

export type PromptCategory = typeof PROMPT_CATEGORIES[number];

export type Urgency = 'crisis' | 'normal';

/**
 * Result of classifying one prompt. Recomputed per request, never persisted.
 */
export interface PromptClassification {
  category: PromptCategory;
  urgency: Urgency;
  matchedKeyword?: string;    // Keyword that decided the urgency or category
}

/**
 * Where a worker response came from
 */
export type ResponseSource = 'cache' | 'crisis' | 'template' | 'generated' | 'fallback';

/**
 * Round
 * One evaluation cycle: prompt -> reference -> dispatch -> score -> update.
 */
export interface Round {
  roundId: number;            // Monotonic per evaluator process
  requestId: string;          // Opaque id sent to every worker
  prompt: string;
  referenceAnswer: string;
  workerIds: WorkerId[];      // Unique, in dispatch order
  createdAt: number;          // Unix ms
}

/**
 * Candidate
 * One worker's reply within a round. `output === null` means no/failed reply.
 */
export interface Candidate {
  workerId: WorkerId;
  output: string | null;
  latencySeconds: number;     // Measured by the evaluator; meaningless when output is null
  error?: string;             // Why the reply is absent, when known
}

/**
 * Score Record
 * One per candidate with an output. Consumed by the reputation updater and the sink.
 */
export interface ScoreRecord {
  workerId: WorkerId;
  qualityScore: number;           // Judge score in [0, 1]
  latencySeconds: number;
  latencyBonus: number;           // Tier bonus before weighting (0, 20, 50 or 100)
  latencyContribution: number;    // latencyBonus x latency weight
  qualityContribution: number;    // qualityScore x 100 x quality weight
  total: number;                  // Blended incentive in [0, 100]
}

/**
 * Worker request record sent over the peer transport
 */
export interface WorkerRequest {
  prompt: string;
  requestId: string;
  requesterId?: string;
  requesterStake?: number;
}

/**
 * Worker response record. `output` is absent when the worker produced nothing.
 */
export interface WorkerResponse {
  prompt: string;
  requestId: string;
  output?: string;
}

export type RoundStatus = 'completed' | 'skipped';

/**
 * Round Report
 * Everything the evaluator derived from one round.
 */
export interface RoundReport {
  round: Round;
  status: RoundStatus;
  skipReason?: string;
  candidates: Candidate[];
  qualityScores: Map<WorkerId, number>;
  records: ScoreRecord[];
  incentives: Map<WorkerId, number>;   // Every sampled worker, absent replies as 0
  completedAt: number;
}
