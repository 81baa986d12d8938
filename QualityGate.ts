/**
 * Quality Gate
 *
 * Boolean checks a candidate response must pass before the worker serves it
 * without falling back to model generation.
 *
 * A response passes when at least `threshold` of the checks succeed
 * and the length check is among them.
 */

import { ResponseCatalog, DEFAULT_RESPONSE_CATALOG } from './ResponseCatalog';

export type QualityCheck = 'length' | 'empathy' | 'actionable' | 'professional' | 'structure';

export interface QualityGateConfig {
  minWords: number;
  maxWords: number;
  threshold: number;          // Fraction of checks that must pass (0-1)
}

export interface QualityReport {
  passed: boolean;
  score: number;              // Fraction of checks passed (0-1)
  wordCount: number;
  checks: Record<QualityCheck, boolean>;
}

export const DEFAULT_QUALITY_GATE_CONFIG: QualityGateConfig = {
  minWords: 50,
  maxWords: 250,
  threshold: 0.7,
};

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export function containsAny(text: string, markers: string[]): boolean {
  const lower = text.toLowerCase();
  return markers.some((marker) => lower.includes(marker));
}

export class QualityGate {
  private config: QualityGateConfig;

  constructor(
    config: Partial<QualityGateConfig> = {},
    private catalog: ResponseCatalog = DEFAULT_RESPONSE_CATALOG
  ) {
    this.config = { ...DEFAULT_QUALITY_GATE_CONFIG, ...config };
  }

  evaluate(response: string): QualityReport {
    const wordCount = countWords(response);
    const markers = this.catalog.quality;

    const checks: Record<QualityCheck, boolean> = {
      length: wordCount >= this.config.minWords && wordCount <= this.config.maxWords,
      empathy: containsAny(response, markers.empathyMarkers),
      actionable: containsAny(response, markers.actionMarkers),
      professional: !containsAny(response, markers.denylist),
      structure: markers.sentenceTerminators.some((terminator) => response.includes(terminator)),
    };

    const results = Object.values(checks);
    const score = results.filter(Boolean).length / results.length;
    const passed = wordCount > 0 && checks.length && score >= this.config.threshold;

    return { passed, score, wordCount, checks };
  }

  passes(response: string): boolean {
    return this.evaluate(response).passed;
  }
}
