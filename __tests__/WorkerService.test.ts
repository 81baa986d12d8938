/**
 * WorkerService Tests
 * 
 * Tests for priority admission, concurrency bound and response records
 */

import { describe, it, expect } from '@jest/globals';
import { WorkerService } from '../WorkerService';
import { WorkerResponsePipeline, PipelineResult } from '../WorkerResponsePipeline';
import { ResponseGenerationService } from '../ResponseGenerationService';
import { RequestPriorityService } from '../RequestPriorityService';
import { GenerationPool } from '../GenerationPool';
import { InMemoryResponseCache } from '../adapters/cache/InMemoryResponseCache';
import { DEFAULT_RESPONSE_CATALOG } from '../ResponseCatalog';
import { EchoEngine, flushPromises, silentLogger } from './helpers/fakes';

/**
 * Pipeline that records the order prompts reach it
 */
class RecordingPipeline extends WorkerResponsePipeline {
  readonly order: string[] = [];
  failWith: Error | null = null;

  constructor() {
    super(
      {
        cache: new InMemoryResponseCache(),
        generator: new ResponseGenerationService(
          new EchoEngine(),
          new GenerationPool(1, silentLogger()),
          {},
          undefined,
          silentLogger()
        ),
      },
      {},
      silentLogger()
    );
  }

  async respond(prompt: string): Promise<PipelineResult> {
    this.order.push(prompt);
    if (this.failWith) {
      throw this.failWith;
    }
    return { output: `answer to ${prompt}`, source: 'generated', cacheKey: prompt, elapsedMs: 0 };
  }
}

function createWorker(pipeline: WorkerResponsePipeline, maxConcurrentRequests: number = 1): WorkerService {
  return new WorkerService(
    pipeline,
    new RequestPriorityService(),
    { workerId: 'worker-1', maxConcurrentRequests },
    silentLogger()
  );
}

describe('WorkerService', () => {
  it('should echo the request id and return the output', async () => {
    const worker = createWorker(new RecordingPipeline());

    await expect(worker.handle({ prompt: 'hello', requestId: 'req-1' })).resolves.toEqual({
      prompt: 'hello',
      requestId: 'req-1',
      output: 'answer to hello',
    });
  });

  it('should answer an empty prompt with the safe fallback', async () => {
    const pipeline = new RecordingPipeline();
    const worker = createWorker(pipeline);

    await expect(worker.handle({ prompt: '   ', requestId: 'req-2' })).resolves.toEqual({
      prompt: '   ',
      requestId: 'req-2',
      output: DEFAULT_RESPONSE_CATALOG.fallbackResponse,
    });
    expect(pipeline.order).toEqual([]);
    expect(worker.getStats().bySource).toEqual({ fallback: 1 });
  });

  it('should admit queued requests by priority, then arrival order', async () => {
    const pipeline = new RecordingPipeline();
    const worker = createWorker(pipeline, 1);

    const replies = [
      worker.handle({ prompt: 'first', requestId: 'r0' }),
      worker.handle({ prompt: 'low', requestId: 'r1', requesterStake: 1 }),
      worker.handle({ prompt: 'tie-a', requestId: 'r2', requesterStake: 5 }),
      worker.handle({ prompt: 'tie-b', requestId: 'r3', requesterStake: 5 }),
      worker.handle({ prompt: 'high', requestId: 'r4', requesterStake: 10 }),
      worker.handle({ prompt: 'I want to die', requestId: 'r5', requesterStake: 6 }),
    ];
    await Promise.all(replies);

    expect(pipeline.order).toEqual(['first', 'I want to die', 'high', 'tie-a', 'tie-b', 'low']);
  });

  it('should respect the concurrency bound', async () => {
    const worker = createWorker(new RecordingPipeline(), 2);

    const replies = [1, 2, 3, 4].map((i) => worker.handle({ prompt: `p${i}`, requestId: `r${i}` }));
    expect(worker.getStats().inFlight).toBe(2);
    expect(worker.getStats().queued).toBe(2);

    await Promise.all(replies);
    await flushPromises();
    expect(worker.getStats()).toEqual({ handled: 4, queued: 0, inFlight: 0, bySource: { generated: 4 } });
  });

  it('should answer with the safe fallback when the pipeline throws', async () => {
    const pipeline = new RecordingPipeline();
    pipeline.failWith = new Error('boom');
    const worker = createWorker(pipeline);

    await expect(worker.handle({ prompt: 'hello', requestId: 'r9' })).resolves.toEqual({
      prompt: 'hello',
      requestId: 'r9',
      output: DEFAULT_RESPONSE_CATALOG.fallbackResponse,
    });
  });

  it('should use a configured fallback text', async () => {
    const worker = new WorkerService(
      new RecordingPipeline(),
      new RequestPriorityService(),
      { workerId: 'worker-2', maxConcurrentRequests: 1, fallbackResponse: 'Please try again.' },
      silentLogger()
    );

    const reply = await worker.handle({ prompt: '', requestId: 'r10' });

    expect(reply.output).toBe('Please try again.');
  });

  it('should reject an invalid concurrency bound', () => {
    expect(() => createWorker(new RecordingPipeline(), 0)).toThrow('positive integer');
  });
});
