/**
 * Judge Oracle Interface
 * 
 * Opaque scorer comparing candidate texts to a reference answer.
 */

export interface JudgeRequest {
    prompt: string;
    reference: string;
    candidates: string[];
}

export interface IJudgeOracle {
    /**
     * Score each candidate against the reference.
     * Returns one score in [0, 1] per candidate, in candidate order.
     * Throws when the oracle is unreachable or its reply cannot be parsed.
     */
    score(request: JudgeRequest): Promise<number[]>;
}
