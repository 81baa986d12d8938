/**
 * Subnet Interfaces
 * Collaborator contracts the evaluator and workers are wired against
 */

export * from './IJudgeOracle';
export * from './IInferenceEngine';
export * from './IPeerTransport';
export * from './IResponseCache';
export * from './IReputationStore';
export * from './IEvaluationSink';
export * from './IPromptSource';
