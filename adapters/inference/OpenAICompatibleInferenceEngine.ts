/**
 * OpenAI-Compatible Inference Engine
 * 
 * Text completion over any server exposing POST /completions
 * (vLLM, llama.cpp server, text-generation-inference with the OpenAI shim).
 */

import axios, { AxiosInstance } from 'axios';
import { IInferenceEngine, InferenceRequest, InferenceResult } from '../../interfaces/IInferenceEngine';
import { ILogger, ConsoleLogger } from '../../utils/ILogger';

export interface InferenceEngineConfig {
    baseUrl: string;
    model: string;
    apiKey?: string;
    timeoutMs: number;
}

function extractCompletionText(data: unknown): string | null {
    if (typeof data !== 'object' || data === null || !('choices' in data) || !Array.isArray(data.choices)) {
        return null;
    }
    const first: unknown = data.choices[0];
    if (typeof first !== 'object' || first === null || !('text' in first)) {
        return null;
    }
    return typeof first.text === 'string' ? first.text : null;
}

export class OpenAICompatibleInferenceEngine implements IInferenceEngine {
    private logger: ILogger;
    private client: AxiosInstance;

    constructor(private config: InferenceEngineConfig, logger?: ILogger, client?: AxiosInstance) {
        this.logger = logger || new ConsoleLogger('OpenAICompatibleInferenceEngine');
        const headers: Record<string, string> = { 'Content-Type': 'application/json' };
        if (config.apiKey) {
            headers.Authorization = `Bearer ${config.apiKey}`;
        }
        this.client = client || axios.create({
            baseURL: config.baseUrl,
            timeout: config.timeoutMs,
            headers,
        });
    }

    /**
     * The endpoint returns only the continuation; it is prefixed with the
     * input so callers can strip an echoed prompt the same way for every engine.
     */
    async generate(request: InferenceRequest): Promise<InferenceResult> {
        const startedAt = Date.now();
        const response = await this.client.post<unknown>('/completions', {
            model: this.config.model,
            prompt: request.input,
            max_tokens: request.maxNewTokens,
            min_tokens: request.minNewTokens,
            temperature: request.temperature,
            repetition_penalty: request.repetitionPenalty,
        });

        const text = extractCompletionText(response.data);
        if (text === null) {
            throw new Error('Inference reply has no completion text');
        }

        this.logger.debug('Completion received', {
            model: this.config.model,
            elapsedMs: Date.now() - startedAt,
            characters: text.length,
        });

        return { text: `${request.input}${text}` };
    }
}
