/**
 * Request Priority Service
 *
 * priority = requester stake, doubled for crisis prompts so urgent requests
 * preempt normal ones in the worker's dispatch queue.
 */

import { PromptClassifier } from './PromptClassifier';

export class RequestPriorityService {
  private readonly CRISIS_MULTIPLIER = 2.0;

  constructor(private classifier: PromptClassifier = new PromptClassifier()) { }

  /**
   * Priority for a request. Monotonic in stake; missing or invalid stake counts as 0.
   */
  priority(prompt: string, requesterStake?: number | null): number {
    const stake = typeof requesterStake === 'number' && Number.isFinite(requesterStake)
      ? Math.max(0, requesterStake)
      : 0;

    return this.classifier.isCrisis(prompt) ? stake * this.CRISIS_MULTIPLIER : stake;
  }
}
