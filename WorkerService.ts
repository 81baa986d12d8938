/**
 * Worker Service
 *
 * Inbound side of a worker: admits requests in priority order (FIFO among
 * equal priorities), runs a bounded number of them at once through the
 * response pipeline and answers with a response record.
 */

import { ILogger, ConsoleLogger } from './utils/ILogger';
import { WorkerId, WorkerRequest, WorkerResponse } from './types';
import { WorkerResponsePipeline, PipelineResult } from './WorkerResponsePipeline';
import { RequestPriorityService } from './RequestPriorityService';
import { DEFAULT_RESPONSE_CATALOG } from './ResponseCatalog';

export interface WorkerServiceConfig {
  workerId: WorkerId;
  maxConcurrentRequests: number;
  fallbackResponse?: string;   // Defaults to the catalog's safe fallback
}

interface PendingRequest {
  request: WorkerRequest;
  priority: number;
  sequence: number;
  resolve: (response: WorkerResponse) => void;
}

export interface WorkerStats {
  handled: number;
  queued: number;
  inFlight: number;
  bySource: Record<string, number>;
}

export class WorkerService {
  private logger: ILogger;
  private queue: PendingRequest[] = [];
  private inFlight = 0;
  private sequence = 0;
  private handled = 0;
  private bySource: Record<string, number> = {};
  private fallbackResponse: string;

  constructor(
    private pipeline: WorkerResponsePipeline,
    private priorityService: RequestPriorityService,
    private config: WorkerServiceConfig,
    logger?: ILogger
  ) {
    if (!Number.isInteger(config.maxConcurrentRequests) || config.maxConcurrentRequests < 1) {
      throw new Error(`maxConcurrentRequests must be a positive integer, got ${config.maxConcurrentRequests}`);
    }
    this.logger = logger || new ConsoleLogger(`Worker:${config.workerId}`);
    this.fallbackResponse = config.fallbackResponse ?? DEFAULT_RESPONSE_CATALOG.fallbackResponse;
  }

  getWorkerId(): WorkerId {
    return this.config.workerId;
  }

  /**
   * Handle one request. Always resolves with an output; empty prompts and
   * pipeline failures get the safe fallback.
   */
  handle(request: WorkerRequest): Promise<WorkerResponse> {
    if (!request.prompt || !request.prompt.trim()) {
      this.logger.warn('Empty prompt, answering with fallback', { requestId: request.requestId });
      this.countSource('fallback');
      return Promise.resolve({
        prompt: request.prompt,
        requestId: request.requestId,
        output: this.fallbackResponse,
      });
    }

    const priority = this.priorityService.priority(request.prompt, request.requesterStake);
    return new Promise<WorkerResponse>((resolve) => {
      this.enqueue({ request, priority, sequence: this.sequence++, resolve });
      this.drain();
    });
  }

  getStats(): WorkerStats {
    return {
      handled: this.handled,
      queued: this.queue.length,
      inFlight: this.inFlight,
      bySource: { ...this.bySource },
    };
  }

  /**
   * Insert keeping the queue sorted by priority desc, then arrival order
   */
  private enqueue(pending: PendingRequest): void {
    const index = this.queue.findIndex((queued) => queued.priority < pending.priority);
    if (index === -1) {
      this.queue.push(pending);
    } else {
      this.queue.splice(index, 0, pending);
    }
  }

  private drain(): void {
    while (this.inFlight < this.config.maxConcurrentRequests && this.queue.length > 0) {
      const next = this.queue.shift();
      if (!next) {
        return;
      }
      this.inFlight++;
      void this.process(next).finally(() => {
        this.inFlight--;
        this.drain();
      });
    }
  }

  private async process(pending: PendingRequest): Promise<void> {
    const { request } = pending;
    let result: PipelineResult;
    try {
      result = await this.pipeline.respond(request.prompt);
    } catch (error) {
      this.logger.error('Pipeline failed', {
        requestId: request.requestId,
        error: error instanceof Error ? error.message : String(error),
      });
      this.countSource('fallback');
      pending.resolve({
        prompt: request.prompt,
        requestId: request.requestId,
        output: this.fallbackResponse,
      });
      return;
    }

    this.countSource(result.source);
    this.logger.info('Request answered', {
      requestId: request.requestId,
      source: result.source,
      priority: pending.priority,
      elapsedMs: result.elapsedMs,
    });

    pending.resolve({
      prompt: request.prompt,
      requestId: request.requestId,
      output: result.output,
    });
  }

  private countSource(source: string): void {
    this.handled++;
    this.bySource[source] = (this.bySource[source] || 0) + 1;
  }
}
