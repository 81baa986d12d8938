/**
 * SubnetFactory Tests
 *
 * Workers wired from the default configuration
 */

import { describe, it, expect } from '@jest/globals';
import { SubnetFactory } from '../factory/SubnetFactory';
import { DEFAULT_SUBNET_CONFIG } from '../factory/SubnetConfig';
import { DEFAULT_RESPONSE_CATALOG } from '../ResponseCatalog';
import { IInferenceEngine, InferenceRequest, InferenceResult } from '../interfaces/IInferenceEngine';
import { deferred, flushPromises, silentLogger } from './helpers/fakes';

/**
 * Engine that holds every generation until the gate opens
 */
class GatedEngine implements IInferenceEngine {
  readonly gate = deferred<void>();
  readonly requests: InferenceRequest[] = [];

  async generate(request: InferenceRequest): Promise<InferenceResult> {
    this.requests.push(request);
    await this.gate.promise;
    return { text: 'I hear you, and that sounds hard. Let us look at it together.' };
  }
}

describe('SubnetFactory.createWorker', () => {
  it('should keep one request in flight with the default config', async () => {
    const engine = new GatedEngine();
    const worker = SubnetFactory.createWorker('w1', DEFAULT_SUBNET_CONFIG, {
      inferenceEngine: engine,
      logger: silentLogger(),
    });

    const replies = [
      worker.handle({ prompt: 'I keep thinking about my job', requestId: 'r1' }),
      worker.handle({ prompt: 'My cat ignores me', requestId: 'r2' }),
      worker.handle({ prompt: 'What should I cook tonight', requestId: 'r3' }),
    ];
    await flushPromises();

    expect(worker.getStats().inFlight).toBe(1);
    expect(worker.getStats().queued).toBe(2);

    engine.gate.resolve();
    const answered = await Promise.all(replies);
    await flushPromises();

    expect(answered.map((reply) => reply.requestId)).toEqual(['r1', 'r2', 'r3']);
    expect(answered.every((reply) => typeof reply.output === 'string')).toBe(true);
    expect(worker.getStats().handled).toBe(3);
    expect(worker.getStats().inFlight).toBe(0);
  });

  it('should answer an empty prompt with the safe fallback', async () => {
    const worker = SubnetFactory.createWorker('w2', DEFAULT_SUBNET_CONFIG, {
      inferenceEngine: new GatedEngine(),
      logger: silentLogger(),
    });

    const reply = await worker.handle({ prompt: '  ', requestId: 'x' });

    expect(reply).toEqual({ prompt: '  ', requestId: 'x', output: DEFAULT_RESPONSE_CATALOG.fallbackResponse });
  });
});
