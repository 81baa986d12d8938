/**
 * Subnet Configuration
 *
 * Environment-driven settings for the evaluator and workers.
 * Unset variables take the defaults below; the merged result is validated
 * with JSON schema before anything is constructed from it.
 */

import { JSONSchemaType } from 'ajv';
import { JSONSchemaValidator } from '../JSONSchemaValidator';
import { ILogger, ConsoleLogger } from '../utils/ILogger';
import { WorkerEndpoint } from '../adapters/p2p/HTTPPeerTransport';

export interface JudgeSettings {
    apiKey?: string;
    model: string;
    baseUrl: string;
}

export interface InferenceSettings {
    baseUrl: string;
    model: string;
}

export interface EvaluatorSettings {
    inputBudget: number;
    roundIntervalMs: number;
    dispatchTimeoutMs: number;
    sampleSize: number;
    reputationAlpha: number;
}

export interface WorkerSettings {
    cacheMaxSize: number;
    enableCache: boolean;
    cacheCrisisResponses: boolean;
    preferTemplates: boolean;
    generationWorkers: number;
    maxConcurrentRequests: number;
    qualityThreshold: number;
}

export interface SubnetConfig {
    judge: JudgeSettings;
    inference: InferenceSettings;
    evaluator: EvaluatorSettings;
    worker: WorkerSettings;
    workers: WorkerEndpoint[];
    redisUrl?: string;
}

export const DEFAULT_SUBNET_CONFIG: SubnetConfig = {
    judge: {
        model: 'gpt-4',
        baseUrl: 'https://api.openai.com/v1',
    },
    inference: {
        baseUrl: 'http://localhost:8000/v1',
        model: 'reference-model',
    },
    evaluator: {
        inputBudget: 8192,
        roundIntervalMs: 300_000,
        dispatchTimeoutMs: 500_000,
        sampleSize: 50,
        reputationAlpha: 0.1,
    },
    worker: {
        cacheMaxSize: 1000,
        enableCache: true,
        cacheCrisisResponses: false,
        preferTemplates: true,
        generationWorkers: 4,
        maxConcurrentRequests: 1,
        qualityThreshold: 0.7,
    },
    workers: [],
};

const SUBNET_CONFIG_SCHEMA: JSONSchemaType<SubnetConfig> = {
    type: 'object',
    properties: {
        judge: {
            type: 'object',
            properties: {
                apiKey: { type: 'string', nullable: true, minLength: 1 },
                model: { type: 'string', minLength: 1 },
                baseUrl: { type: 'string', format: 'uri' },
            },
            required: ['model', 'baseUrl'],
            additionalProperties: false,
        },
        inference: {
            type: 'object',
            properties: {
                baseUrl: { type: 'string', format: 'uri' },
                model: { type: 'string', minLength: 1 },
            },
            required: ['baseUrl', 'model'],
            additionalProperties: false,
        },
        evaluator: {
            type: 'object',
            properties: {
                inputBudget: { type: 'integer', minimum: 1 },
                roundIntervalMs: { type: 'integer', minimum: 0 },
                dispatchTimeoutMs: { type: 'integer', minimum: 1 },
                sampleSize: { type: 'integer', minimum: 1 },
                reputationAlpha: { type: 'number', exclusiveMinimum: 0, maximum: 1 },
            },
            required: ['inputBudget', 'roundIntervalMs', 'dispatchTimeoutMs', 'sampleSize', 'reputationAlpha'],
            additionalProperties: false,
        },
        worker: {
            type: 'object',
            properties: {
                cacheMaxSize: { type: 'integer', minimum: 1 },
                enableCache: { type: 'boolean' },
                cacheCrisisResponses: { type: 'boolean' },
                preferTemplates: { type: 'boolean' },
                generationWorkers: { type: 'integer', minimum: 1 },
                maxConcurrentRequests: { type: 'integer', minimum: 1 },
                qualityThreshold: { type: 'number', minimum: 0, maximum: 1 },
            },
            required: [
                'cacheMaxSize',
                'enableCache',
                'cacheCrisisResponses',
                'preferTemplates',
                'generationWorkers',
                'maxConcurrentRequests',
                'qualityThreshold',
            ],
            additionalProperties: false,
        },
        workers: {
            type: 'array',
            items: {
                type: 'object',
                properties: {
                    workerId: { type: 'string', minLength: 1 },
                    endpoint: { type: 'string', format: 'uri' },
                },
                required: ['workerId', 'endpoint'],
                additionalProperties: false,
            },
        },
        redisUrl: { type: 'string', nullable: true, format: 'uri' },
    },
    required: ['judge', 'inference', 'evaluator', 'worker', 'workers'],
    additionalProperties: false,
};

function readString(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

function readNumber(value: string | undefined, fallback: number): number {
    const raw = readString(value);
    return raw === undefined ? fallback : Number(raw);
}

function readBoolean(name: string, value: string | undefined, fallback: boolean): boolean {
    const raw = readString(value)?.toLowerCase();
    if (raw === undefined) {
        return fallback;
    }
    if (['true', '1', 'yes', 'on'].includes(raw)) {
        return true;
    }
    if (['false', '0', 'no', 'off'].includes(raw)) {
        return false;
    }
    throw new Error(`${name} must be a boolean, got "${value}"`);
}

/**
 * Parse "id=url,id=url"
 */
export function parseWorkerEndpoints(value: string | undefined): WorkerEndpoint[] {
    const raw = readString(value);
    if (raw === undefined) {
        return [];
    }

    return raw
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0)
        .map((entry) => {
            const separator = entry.indexOf('=');
            if (separator <= 0) {
                throw new Error(`WORKER_ENDPOINTS entry must be id=url, got "${entry}"`);
            }
            return {
                workerId: entry.slice(0, separator).trim(),
                endpoint: entry.slice(separator + 1).trim(),
            };
        });
}

/**
 * Validate a full config, throwing with every schema error at once
 */
export function validateSubnetConfig(config: unknown, logger?: ILogger): SubnetConfig {
    const validator = new JSONSchemaValidator(logger || new ConsoleLogger('SubnetConfig'));
    const result = validator.validate(config, SUBNET_CONFIG_SCHEMA, 'subnet-config');
    if (!result.valid || !result.value) {
        throw new Error(`Invalid subnet configuration: ${result.errors.join('; ')}`);
    }

    const ids = result.value.workers.map((worker) => worker.workerId);
    const duplicate = ids.find((id, index) => ids.indexOf(id) !== index);
    if (duplicate !== undefined) {
        throw new Error(`Invalid subnet configuration: duplicate worker id "${duplicate}"`);
    }

    return result.value;
}

/**
 * Build the config from environment variables
 */
export function loadSubnetConfig(env: NodeJS.ProcessEnv = process.env, logger?: ILogger): SubnetConfig {
    const defaults = DEFAULT_SUBNET_CONFIG;
    const config: SubnetConfig = {
        judge: {
            apiKey: readString(env.JUDGE_API_KEY),
            model: readString(env.JUDGE_MODEL) ?? defaults.judge.model,
            baseUrl: readString(env.JUDGE_BASE_URL) ?? defaults.judge.baseUrl,
        },
        inference: {
            baseUrl: readString(env.INFERENCE_BASE_URL) ?? defaults.inference.baseUrl,
            model: readString(env.INFERENCE_MODEL) ?? defaults.inference.model,
        },
        evaluator: {
            inputBudget: readNumber(env.EVALS_INPUT_BUDGET, defaults.evaluator.inputBudget),
            roundIntervalMs: readNumber(env.ROUND_INTERVAL_MS, defaults.evaluator.roundIntervalMs),
            dispatchTimeoutMs: readNumber(env.DISPATCH_TIMEOUT_MS, defaults.evaluator.dispatchTimeoutMs),
            sampleSize: readNumber(env.SAMPLE_SIZE, defaults.evaluator.sampleSize),
            reputationAlpha: readNumber(env.REPUTATION_ALPHA, defaults.evaluator.reputationAlpha),
        },
        worker: {
            cacheMaxSize: readNumber(env.CACHE_MAX_SIZE, defaults.worker.cacheMaxSize),
            enableCache: readBoolean('ENABLE_CACHE', env.ENABLE_CACHE, defaults.worker.enableCache),
            cacheCrisisResponses: readBoolean(
                'CACHE_CRISIS_RESPONSES',
                env.CACHE_CRISIS_RESPONSES,
                defaults.worker.cacheCrisisResponses
            ),
            preferTemplates: readBoolean('PREFER_TEMPLATES', env.PREFER_TEMPLATES, defaults.worker.preferTemplates),
            generationWorkers: readNumber(env.GENERATION_WORKERS, defaults.worker.generationWorkers),
            maxConcurrentRequests: readNumber(env.MAX_CONCURRENT_REQUESTS, defaults.worker.maxConcurrentRequests),
            qualityThreshold: readNumber(env.QUALITY_THRESHOLD, defaults.worker.qualityThreshold),
        },
        workers: parseWorkerEndpoints(env.WORKER_ENDPOINTS),
    };

    const redisUrl = readString(env.REDIS_URL);
    if (redisUrl !== undefined) {
        config.redisUrl = redisUrl;
    }
    if (config.judge.apiKey === undefined) {
        delete config.judge.apiKey;
    }

    return validateSubnetConfig(config, logger);
}
