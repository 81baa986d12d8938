/**
 * Subnet Factory
 * Creates configured evaluator and worker instances with appropriate adapters
 */

import { SubnetConfig } from './SubnetConfig';
import {
    IJudgeOracle,
    IInferenceEngine,
    IPeerTransport,
    IReputationStore,
    IResponseCache,
    IPromptSource,
} from '../interfaces';
import { ILogger, ConsoleLogger } from '../utils/ILogger';
import { WorkerId } from '../types';
import { OpenAIJudgeOracle } from '../adapters/judge/OpenAIJudgeOracle';
import { OpenAICompatibleInferenceEngine } from '../adapters/inference/OpenAICompatibleInferenceEngine';
import { HTTPPeerTransport } from '../adapters/p2p/HTTPPeerTransport';
import { InMemoryResponseCache } from '../adapters/cache/InMemoryResponseCache';
import { InMemoryReputationStore } from '../adapters/reputation/InMemoryReputationStore';
import { RedisReputationStore } from '../adapters/reputation/RedisReputationStore';
import { BatchScoringService } from '../BatchScoringService';
import { EvaluatorService } from '../EvaluatorService';
import { EvaluationLedgerService } from '../EvaluationLedgerService';
import { ReferenceAnswerService } from '../ReferenceAnswerService';
import { ReputationService } from '../ReputationService';
import { RoundScheduler } from '../RoundScheduler';
import { SyntheticPromptSource } from '../SyntheticPromptSource';
import { GenerationPool } from '../GenerationPool';
import { QualityGate } from '../QualityGate';
import { RequestPriorityService } from '../RequestPriorityService';
import { ResponseGenerationService } from '../ResponseGenerationService';
import { WorkerResponsePipeline } from '../WorkerResponsePipeline';
import { WorkerService } from '../WorkerService';

const INFERENCE_TIMEOUT_MS = 120_000;

export interface EvaluatorOverrides {
    judge?: IJudgeOracle;
    inferenceEngine?: IInferenceEngine;
    transport?: IPeerTransport;
    reputationStore?: IReputationStore;
    promptSource?: IPromptSource;
    logger?: ILogger;
}

export interface EvaluatorBundle {
    evaluator: EvaluatorService;
    scheduler: RoundScheduler;
    reputation: ReputationService;
    ledger: EvaluationLedgerService;
    transport: IPeerTransport;
    /**
     * Stop the scheduler and release transport and store connections
     */
    shutdown(): Promise<void>;
}

export interface WorkerOverrides {
    inferenceEngine?: IInferenceEngine;
    cache?: IResponseCache;
    logger?: ILogger;
}

function childLogger(logger: ILogger, context: string): ILogger {
    return logger.child ? logger.child(context) : logger;
}

export class SubnetFactory {
    /**
     * Wire an evaluator, its scheduler and its collaborators.
     * Connects to Redis when `redisUrl` is set and no store is supplied.
     */
    static async createEvaluator(config: SubnetConfig, overrides: EvaluatorOverrides = {}): Promise<EvaluatorBundle> {
        const logger = overrides.logger || new ConsoleLogger('Evaluator');

        const judge = overrides.judge || this.createJudge(config, childLogger(logger, 'judge'));
        const engine = overrides.inferenceEngine || this.createInferenceEngine(config, childLogger(logger, 'inference'));
        const transport = overrides.transport || new HTTPPeerTransport(config.workers, childLogger(logger, 'transport'));

        let redisStore: RedisReputationStore | null = null;
        let store = overrides.reputationStore;
        if (!store) {
            if (config.redisUrl) {
                redisStore = new RedisReputationStore(config.redisUrl, childLogger(logger, 'redis'));
                await redisStore.connect();
                store = redisStore;
            } else {
                store = new InMemoryReputationStore();
            }
        }

        const reputation = new ReputationService(store, config.evaluator.reputationAlpha, childLogger(logger, 'reputation'));
        const ledger = new EvaluationLedgerService(childLogger(logger, 'ledger'));
        const evaluator = new EvaluatorService(
            {
                promptSource: overrides.promptSource || new SyntheticPromptSource(),
                referenceGenerator: new ReferenceAnswerService(engine, undefined, childLogger(logger, 'reference')),
                transport,
                scorer: new BatchScoringService(
                    judge,
                    { inputBudget: config.evaluator.inputBudget },
                    childLogger(logger, 'scorer')
                ),
                reputation,
                sink: ledger,
            },
            {
                sampleSize: config.evaluator.sampleSize,
                dispatchTimeoutMs: config.evaluator.dispatchTimeoutMs,
            },
            childLogger(logger, 'rounds')
        );
        const scheduler = new RoundScheduler(
            evaluator,
            { intervalMs: config.evaluator.roundIntervalMs },
            undefined,
            childLogger(logger, 'scheduler')
        );

        return {
            evaluator,
            scheduler,
            reputation,
            ledger,
            transport,
            async shutdown(): Promise<void> {
                await scheduler.stop();
                await transport.shutdown();
                if (redisStore) {
                    await redisStore.disconnect();
                }
            },
        };
    }

    /**
     * Wire one worker: cache, classifier, templates, quality gate and generation pool
     */
    static createWorker(workerId: WorkerId, config: SubnetConfig, overrides: WorkerOverrides = {}): WorkerService {
        const logger = overrides.logger || new ConsoleLogger(`Worker:${workerId}`);
        const settings = config.worker;

        const engine = overrides.inferenceEngine || this.createInferenceEngine(config, childLogger(logger, 'inference'));
        const pool = new GenerationPool(settings.generationWorkers, childLogger(logger, 'pool'));
        const generator = new ResponseGenerationService(engine, pool, {}, undefined, childLogger(logger, 'generation'));
        const pipeline = new WorkerResponsePipeline(
            {
                cache: overrides.cache || new InMemoryResponseCache(settings.cacheMaxSize),
                generator,
                qualityGate: new QualityGate({ threshold: settings.qualityThreshold }),
            },
            {
                enableCache: settings.enableCache,
                cacheCrisisResponses: settings.cacheCrisisResponses,
                preferTemplates: settings.preferTemplates,
            },
            childLogger(logger, 'pipeline')
        );

        return new WorkerService(
            pipeline,
            new RequestPriorityService(),
            { workerId, maxConcurrentRequests: settings.maxConcurrentRequests },
            logger
        );
    }

    private static createJudge(config: SubnetConfig, logger: ILogger): IJudgeOracle {
        const { apiKey, model, baseUrl } = config.judge;
        if (!apiKey) {
            throw new Error('JUDGE_API_KEY is required to create the judge oracle');
        }
        return new OpenAIJudgeOracle({ apiKey, model, baseUrl }, logger);
    }

    private static createInferenceEngine(config: SubnetConfig, logger: ILogger): IInferenceEngine {
        return new OpenAICompatibleInferenceEngine(
            {
                baseUrl: config.inference.baseUrl,
                model: config.inference.model,
                timeoutMs: INFERENCE_TIMEOUT_MS,
            },
            logger
        );
    }
}
