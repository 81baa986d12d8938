/**
 * Response Generation Service
 *
 * Slow path of the worker pipeline: frames the prompt with the system
 * instruction, runs the inference engine on the generation pool, keeps only
 * the newly generated continuation and post-processes it.
 */

import { ILogger, ConsoleLogger } from './utils/ILogger';
import { IInferenceEngine, InferenceRequest } from './interfaces/IInferenceEngine';
import { GenerationPool } from './GenerationPool';
import { ResponseCatalog, DEFAULT_RESPONSE_CATALOG } from './ResponseCatalog';
import { containsAny, countWords } from './QualityGate';

/**
 * Generation Settings
 */
export interface GenerationConfig {
  maxInputChars: number;      // Bound on the framed input handed to the engine
  maxNewTokens: number;
  minNewTokens: number;
  temperature: number;
  repetitionPenalty: number;
  maxWords: number;           // Longer outputs are truncated
  minWords: number;           // Shorter outputs get the help-seeking suffix
}

export const DEFAULT_GENERATION_CONFIG: GenerationConfig = {
  maxInputChars: 2048,
  maxNewTokens: 150,
  minNewTokens: 50,
  temperature: 0.7,
  repetitionPenalty: 1.1,
  maxWords: 200,
  minWords: 30,
};

export class ResponseGenerationService {
  private logger: ILogger;
  private config: GenerationConfig;

  constructor(
    private engine: IInferenceEngine,
    private pool: GenerationPool,
    config: Partial<GenerationConfig> = {},
    private catalog: ResponseCatalog = DEFAULT_RESPONSE_CATALOG,
    logger?: ILogger
  ) {
    this.logger = logger || new ConsoleLogger('ResponseGenerationService');
    this.config = { ...DEFAULT_GENERATION_CONFIG, ...config };
  }

  /**
   * Generate a post-processed response for a prompt
   */
  async generate(prompt: string): Promise<string> {
    const input = this.buildInput(prompt);
    const request: InferenceRequest = {
      input,
      maxNewTokens: this.config.maxNewTokens,
      minNewTokens: this.config.minNewTokens,
      temperature: this.config.temperature,
      repetitionPenalty: this.config.repetitionPenalty,
    };

    const startedAt = Date.now();
    const result = await this.pool.run(() => this.engine.generate(request));
    const continuation = this.extractContinuation(input, result.text);

    this.logger.debug('Model response generated', {
      elapsedMs: Date.now() - startedAt,
      inputChars: input.length,
      outputChars: continuation.length,
    });

    return this.postProcess(continuation);
  }

  /**
   * Frame the prompt. The user prompt is truncated so the whole input stays
   * within maxInputChars; the framing itself is never cut.
   */
  buildInput(prompt: string): string {
    const head = `${this.catalog.systemInstruction}\n\nUser: `;
    const tail = '\n\nTherapist:';
    const room = Math.max(0, this.config.maxInputChars - head.length - tail.length);
    const userText = prompt.trim().slice(0, room);

    return `${head}${userText}${tail}`;
  }

  /**
   * Drop the echoed input when the engine returns it as a prefix
   */
  extractContinuation(input: string, text: string): string {
    const continuation = text.startsWith(input) ? text.slice(input.length) : text;
    return continuation.trim();
  }

  /**
   * Strip role prefixes, bound the length and make sure the tone is empathetic
   */
  postProcess(raw: string): string {
    let response = raw;
    for (const prefix of this.catalog.rolePrefixes) {
      response = response.split(prefix).join('');
    }
    response = response.trim();

    const words = response.split(/\s+/).filter(Boolean);
    if (words.length > this.config.maxWords) {
      response = `${words.slice(0, this.config.maxWords).join(' ')}...`;
    } else if (countWords(response) < this.config.minWords) {
      response = `${response} ${this.catalog.shortResponseSuffix}`.trim();
    }

    if (!containsAny(response, this.catalog.quality.empathyMarkers)) {
      response = `${this.catalog.empathyOpener} ${response}`;
    }

    return response.trim();
  }
}
