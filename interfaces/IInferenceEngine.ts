/**
 * Inference Engine Interface
 * 
 * Text generation backend used for reference answers and worker fallbacks.
 */

export interface InferenceRequest {
    input: string;
    maxNewTokens: number;
    minNewTokens?: number;
    temperature?: number;
    repetitionPenalty?: number;
}

export interface InferenceResult {
    /**
     * Generated text. Engines that echo the input include it as a prefix.
     */
    text: string;
}

export interface IInferenceEngine {
    generate(request: InferenceRequest): Promise<InferenceResult>;
}

/**
 * Produces the baseline answer candidates are judged against
 */
export interface IReferenceGenerator {
    generate(prompt: string): Promise<string>;
}
