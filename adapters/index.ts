/**
 * Subnet Adapters
 * Export all adapter implementations
 */

export * from './judge/OpenAIJudgeOracle';
export * from './inference/OpenAICompatibleInferenceEngine';
export * from './p2p/HTTPPeerTransport';
export * from './p2p/LocalPeerTransport';
export * from './cache/InMemoryResponseCache';
export * from './reputation/InMemoryReputationStore';
export * from './reputation/RedisReputationStore';
