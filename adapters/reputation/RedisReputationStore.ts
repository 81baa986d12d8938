/**
 * Redis Reputation Store
 * 
 * Redis implementation of IReputationStore. Reputations live in one hash;
 * merges are HSET on the changed fields only.
 */

import { createClient } from 'redis';
import { IReputationStore } from '../../interfaces/IReputationStore';
import { WorkerId } from '../../types';
import { ILogger } from '../../utils/ILogger';

export type RedisClient = ReturnType<typeof createClient>;

export class RedisReputationStore implements IReputationStore {
    private client: RedisClient;
    private logger: ILogger;
    private isConnected: boolean = false;

    constructor(
        redisUrl: string,
        logger: ILogger,
        private readonly hashKey: string = 'subnet:reputation'
    ) {
        this.logger = logger;
        this.client = createClient({ url: redisUrl });

        this.client.on('error', (err: unknown) => {
            this.logger.error('Redis client error', {
                error: err instanceof Error ? err.message : String(err),
            });
        });

        this.client.on('connect', () => {
            this.isConnected = true;
            this.logger.info('Redis client connected');
        });

        this.client.on('end', () => {
            this.isConnected = false;
            this.logger.warn('Redis connection closed');
        });
    }

    async connect(): Promise<void> {
        if (!this.isConnected) {
            await this.client.connect();
        }
    }

    async load(): Promise<Map<WorkerId, number>> {
        const raw = await this.client.hGetAll(this.hashKey);
        const reputations = new Map<WorkerId, number>();

        for (const [workerId, value] of Object.entries(raw)) {
            const parsed = Number(value);
            if (Number.isFinite(parsed)) {
                reputations.set(workerId, parsed);
            } else {
                this.logger.warn('Ignoring non-numeric reputation value', { workerId, value });
            }
        }

        return reputations;
    }

    async merge(updates: Map<WorkerId, number>): Promise<void> {
        if (updates.size === 0) {
            return;
        }

        const fields: Record<string, string> = {};
        for (const [workerId, value] of updates) {
            fields[workerId] = String(value);
        }

        await this.client.hSet(this.hashKey, fields);
    }

    async disconnect(): Promise<void> {
        if (this.isConnected) {
            await this.client.quit();
            this.isConnected = false;
        }
    }
}
