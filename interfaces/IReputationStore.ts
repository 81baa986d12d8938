/**
 * Reputation Store Interface
 * 
 * Persistence for per-worker reputation. Merge-only: updates never replace the
 * stored set wholesale.
 */

import { WorkerId } from '../types';

export interface IReputationStore {
    /**
     * Load every stored reputation value
     */
    load(): Promise<Map<WorkerId, number>>;

    /**
     * Merge updated values into the store
     */
    merge(updates: Map<WorkerId, number>): Promise<void>;
}

/**
 * Consumer of the per-round incentive vector.
 * Worker ids missing from the vector are treated as an implicit 0.
 */
export interface IReputationUpdater {
    applyIncentives(incentives: Map<WorkerId, number>): Promise<void>;
}
