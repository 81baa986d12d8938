/**
 * Worker Response Pipeline
 *
 * Per-request decision pipeline run inside each worker:
 * 1. Cache lookup (hit returns immediately)
 * 2. Safety check (crisis prompts get the fixed crisis-resources response)
 * 3. Category classification
 * 4. Template attempt, accepted only if it passes the quality gate
 * 5. Fallback model generation
 * 6. Cache insert with bounded eviction
 *
 * Failures in stages 3-5 resolve to the fixed safe fallback response.
 */

import { ILogger, ConsoleLogger } from './utils/ILogger';
import { IResponseCache } from './interfaces/IResponseCache';
import { PromptClassification, ResponseSource } from './types';
import { PromptClassifier } from './PromptClassifier';
import { ResponseTemplateService } from './ResponseTemplateService';
import { QualityGate } from './QualityGate';
import { ResponseGenerationService } from './ResponseGenerationService';
import { ResponseCatalog, DEFAULT_RESPONSE_CATALOG } from './ResponseCatalog';

export interface PipelineConfig {
  enableCache: boolean;
  cacheCrisisResponses: boolean;  // Off: every crisis prompt is re-evaluated
  preferTemplates: boolean;       // Off: always generate
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  enableCache: true,
  cacheCrisisResponses: false,
  preferTemplates: true,
};

export interface PipelineDependencies {
  cache: IResponseCache;
  generator: ResponseGenerationService;
  classifier?: PromptClassifier;
  templates?: ResponseTemplateService;
  qualityGate?: QualityGate;
  catalog?: ResponseCatalog;
}

export interface PipelineResult {
  output: string;
  source: ResponseSource;
  cacheKey: string;
  classification?: PromptClassification;
  elapsedMs: number;
}

export class WorkerResponsePipeline {
  private logger: ILogger;
  private config: PipelineConfig;
  private cache: IResponseCache;
  private generator: ResponseGenerationService;
  private classifier: PromptClassifier;
  private templates: ResponseTemplateService;
  private qualityGate: QualityGate;
  private catalog: ResponseCatalog;

  constructor(dependencies: PipelineDependencies, config: Partial<PipelineConfig> = {}, logger?: ILogger) {
    this.logger = logger || new ConsoleLogger('WorkerResponsePipeline');
    this.config = { ...DEFAULT_PIPELINE_CONFIG, ...config };
    this.catalog = dependencies.catalog || DEFAULT_RESPONSE_CATALOG;
    this.cache = dependencies.cache;
    this.generator = dependencies.generator;
    this.classifier = dependencies.classifier || new PromptClassifier(this.catalog);
    this.templates = dependencies.templates || new ResponseTemplateService(this.catalog);
    this.qualityGate = dependencies.qualityGate || new QualityGate({}, this.catalog);
  }

  /**
   * Produce a response for one prompt. Never rejects.
   */
  async respond(prompt: string): Promise<PipelineResult> {
    const startedAt = Date.now();
    const cacheKey = this.cache.keyFor(prompt);
    const finish = (
      output: string,
      source: ResponseSource,
      classification?: PromptClassification
    ): PipelineResult => ({
      output,
      source,
      cacheKey,
      classification,
      elapsedMs: Date.now() - startedAt,
    });

    const crisis = this.classifier.isCrisis(prompt);

    if (this.config.enableCache) {
      const cached = await this.lookup(cacheKey);
      // A crisis prompt is only ever answered with the crisis response
      if (cached !== null && (!crisis || cached === this.catalog.crisisResponse)) {
        this.logger.debug('Cache hit', { cacheKey });
        return finish(cached, 'cache');
      }
    }

    // Crisis routing never fails and bypasses the rest of the pipeline
    if (crisis) {
      const classification = this.classifier.classify(prompt);
      this.logger.warn('Crisis prompt detected, returning crisis resources', {
        keyword: classification.matchedKeyword,
      });
      if (this.config.enableCache && this.config.cacheCrisisResponses) {
        await this.store(cacheKey, this.catalog.crisisResponse);
      }
      return finish(this.catalog.crisisResponse, 'crisis', classification);
    }

    let classification: PromptClassification | undefined;
    let output: string;
    let source: ResponseSource;
    try {
      classification = this.classifier.classify(prompt);
      const templated = this.tryTemplate(classification);
      if (templated !== null) {
        output = templated;
        source = 'template';
      } else {
        output = await this.generator.generate(prompt);
        source = 'generated';
      }
    } catch (error) {
      this.logger.error('Response generation failed, using fallback', {
        cacheKey,
        error: error instanceof Error ? error.message : String(error),
      });
      return finish(this.catalog.fallbackResponse, 'fallback', classification);
    }

    if (this.config.enableCache) {
      await this.store(cacheKey, output);
    }

    return finish(output, source, classification);
  }

  /**
   * Templated answer for non-general categories, or null when the gate rejects it
   */
  private tryTemplate(classification: PromptClassification): string | null {
    if (!this.config.preferTemplates || classification.category === 'general') {
      return null;
    }

    const candidate = this.templates.build(classification.category);
    const report = this.qualityGate.evaluate(candidate);
    if (!report.passed) {
      this.logger.debug('Template rejected by quality gate', {
        category: classification.category,
        score: report.score,
        checks: report.checks,
      });
      return null;
    }

    return candidate;
  }

  /**
   * Cache reads degrade to a miss
   */
  private async lookup(cacheKey: string): Promise<string | null> {
    try {
      return await this.cache.get(cacheKey);
    } catch (error) {
      this.logger.warn('Cache lookup failed', {
        cacheKey,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  /**
   * Cache writes are best effort; the response is served either way
   */
  private async store(cacheKey: string, output: string): Promise<void> {
    try {
      await this.cache.set(cacheKey, output);
    } catch (error) {
      this.logger.warn('Cache insert failed', {
        cacheKey,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
