/**
 * Empathy Subnet
 *
 * Evaluator and worker for a decentralized evaluation network:
 * - Evaluator: prompt -> reference -> fan-out -> batch judge scoring -> blended incentives -> reputation
 * - Worker: cache -> safety routing -> classification -> template or generation -> cache
 */

// Core Interfaces
export * from './interfaces';

// Types
export * from './types';

// Utilities
export * from './utils';

// Evaluator
export * from './BatchScoringService';
export * from './ScoreBlendingService';
export * from './EvaluatorService';
export * from './RoundScheduler';
export * from './ReputationService';
export * from './EvaluationLedgerService';
export * from './ReferenceAnswerService';
export * from './SyntheticPromptSource';
export * from './JSONSchemaValidator';

// Worker
export * from './ResponseCatalog';
export * from './PromptClassifier';
export * from './QualityGate';
export * from './ResponseTemplateService';
export * from './ResponseGenerationService';
export * from './GenerationPool';
export * from './WorkerResponsePipeline';
export * from './RequestPriorityService';
export * from './WorkerService';

// Adapters
export * from './adapters';

// Factory
export * from './factory';
