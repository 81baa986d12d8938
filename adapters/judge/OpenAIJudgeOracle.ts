/**
 * OpenAI Judge Oracle
 * 
 * LLM-as-judge over an OpenAI-compatible chat-completions endpoint.
 * The judge is asked for {"scores": [...]} with 0.7 meaning "as good as the reference".
 */

import axios, { AxiosInstance } from 'axios';
import { JSONSchemaType } from 'ajv';
import { IJudgeOracle, JudgeRequest } from '../../interfaces/IJudgeOracle';
import { ILogger, ConsoleLogger } from '../../utils/ILogger';
import { JSONSchemaValidator } from '../../JSONSchemaValidator';
import { clampScore } from '../../BatchScoringService';

export interface OpenAIJudgeConfig {
    apiKey: string;
    model: string;
    baseUrl: string;
    timeoutMs: number;
}

export const DEFAULT_JUDGE_CONFIG: Omit<OpenAIJudgeConfig, 'apiKey'> = {
    model: 'gpt-4',
    baseUrl: 'https://api.openai.com/v1',
    timeoutMs: 60_000,
};

interface JudgePayload {
    scores: number[];
}

const JUDGE_PAYLOAD_SCHEMA: JSONSchemaType<JudgePayload> = {
    type: 'object',
    properties: {
        scores: { type: 'array', items: { type: 'number' } },
    },
    required: ['scores'],
    additionalProperties: true,
};

const SYSTEM_PROMPT = 'You are a strict and fair judge for therapy responses.';

export function buildJudgePrompt(request: JudgeRequest): string {
    const numbered = request.candidates
        .map((candidate, index) => `Therapist ${index + 1}: ${candidate}`)
        .join('\n');

    return [
        'You are an expert evaluator. Given the following prompt, the base response, and a set of therapist responses, ' +
            "score each therapist's response on a scale from 0 to 1. " +
            'A score of 0.7 means the response is as good as the base response. Score higher if the response is better, lower if worse. ' +
            'Reply in the following format (JSON):',
        '{"scores": [score1, score2, ...]}',
        '',
        `Prompt: ${request.prompt}`,
        `Base Response: ${request.reference}`,
        '',
        'Therapist Responses:',
        numbered,
        '',
        'What are the scores for each response? (Output JSON only)',
    ].join('\n');
}

/**
 * Drop a surrounding ```json fence if the judge added one
 */
export function stripCodeFence(content: string): string {
    const match = content.trim().match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
    return match ? match[1] : content.trim();
}

function extractMessageContent(data: unknown): string | null {
    if (typeof data !== 'object' || data === null || !('choices' in data) || !Array.isArray(data.choices)) {
        return null;
    }
    const first: unknown = data.choices[0];
    if (typeof first !== 'object' || first === null || !('message' in first)) {
        return null;
    }
    const message: unknown = first.message;
    if (typeof message !== 'object' || message === null || !('content' in message)) {
        return null;
    }
    return typeof message.content === 'string' ? message.content : null;
}

export class OpenAIJudgeOracle implements IJudgeOracle {
    private logger: ILogger;
    private config: OpenAIJudgeConfig;
    private client: AxiosInstance;
    private validator: JSONSchemaValidator;

    constructor(
        config: Partial<OpenAIJudgeConfig> & { apiKey: string },
        logger?: ILogger,
        client?: AxiosInstance
    ) {
        this.logger = logger || new ConsoleLogger('OpenAIJudgeOracle');
        this.config = { ...DEFAULT_JUDGE_CONFIG, ...config };
        this.validator = new JSONSchemaValidator(this.logger.child ? this.logger.child('schema') : this.logger);
        this.client = client || axios.create({
            baseURL: this.config.baseUrl,
            timeout: this.config.timeoutMs,
            headers: {
                Authorization: `Bearer ${this.config.apiKey}`,
                'Content-Type': 'application/json',
            },
        });
    }

    async score(request: JudgeRequest): Promise<number[]> {
        if (request.candidates.length === 0) {
            return [];
        }

        const response = await this.client.post<unknown>('/chat/completions', {
            model: this.config.model,
            messages: [
                { role: 'system', content: SYSTEM_PROMPT },
                { role: 'user', content: buildJudgePrompt(request) },
            ],
        });

        const content = extractMessageContent(response.data);
        if (content === null) {
            throw new Error('Judge reply has no message content');
        }

        return this.parseScores(content);
    }

    /**
     * Parse and clamp the judge's JSON reply
     */
    parseScores(content: string): number[] {
        let parsed: unknown;
        try {
            parsed = JSON.parse(stripCodeFence(content));
        } catch (error) {
            this.logger.error('Judge reply is not JSON', {
                error: error instanceof Error ? error.message : String(error),
                content,
            });
            throw new Error('Judge reply is not valid JSON');
        }

        const result = this.validator.validate(parsed, JUDGE_PAYLOAD_SCHEMA, 'judge-payload');
        if (!result.valid || !result.value) {
            throw new Error(`Judge reply failed validation: ${result.errors.join('; ')}`);
        }

        return result.value.scores.map(clampScore);
    }
}
