/**
 * In-Memory Reputation Store
 * 
 * Process-local implementation of IReputationStore for development/testing
 */

import { IReputationStore } from '../../interfaces/IReputationStore';
import { WorkerId } from '../../types';

export class InMemoryReputationStore implements IReputationStore {
    private reputations: Map<WorkerId, number>;

    constructor(initial?: Map<WorkerId, number>) {
        this.reputations = new Map(initial);
    }

    async load(): Promise<Map<WorkerId, number>> {
        return new Map(this.reputations);
    }

    async merge(updates: Map<WorkerId, number>): Promise<void> {
        for (const [workerId, value] of updates) {
            this.reputations.set(workerId, value);
        }
    }
}
