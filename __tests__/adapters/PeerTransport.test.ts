/**
 * Peer Transport Tests
 * 
 * HTTPPeerTransport with a stubbed axios instance, LocalPeerTransport with real workers
 */

import { describe, it, expect, jest } from '@jest/globals';
import axios, { AxiosHeaders } from 'axios';
import { HTTPPeerTransport, parseWorkerReply } from '../../adapters/p2p/HTTPPeerTransport';
import { LocalPeerTransport } from '../../adapters/p2p/LocalPeerTransport';
import { SubnetFactory } from '../../factory/SubnetFactory';
import { DEFAULT_SUBNET_CONFIG } from '../../factory/SubnetConfig';
import { IInferenceEngine } from '../../interfaces/IInferenceEngine';
import { EchoEngine, silentLogger } from '../helpers/fakes';

const REQUEST = { prompt: 'How can I manage my anxiety?', requestId: 'req_1' };

describe('HTTPPeerTransport', () => {
  it('should post the prompt to the worker inference route', async () => {
    const client = axios.create();
    const post = jest.spyOn(client, 'post').mockResolvedValue({
      data: { prompt: REQUEST.prompt, request_id: 'req_1', output: 'Try breathing.' },
      status: 200,
      statusText: 'OK',
      headers: {},
      config: { headers: new AxiosHeaders() },
    });
    const transport = new HTTPPeerTransport(
      [{ workerId: 'w1', endpoint: 'http://w1.test/' }],
      silentLogger(),
      client
    );

    const response = await transport.send('w1', REQUEST, { timeoutMs: 1_000 });

    expect(response).toEqual({ prompt: REQUEST.prompt, requestId: 'req_1', output: 'Try breathing.' });
    expect(post).toHaveBeenCalledWith(
      'http://w1.test/inference',
      { prompt: REQUEST.prompt, request_id: 'req_1' },
      { signal: undefined, timeout: 1_000 }
    );
  });

  it('should list registered workers', async () => {
    const transport = new HTTPPeerTransport(
      [
        { workerId: 'w1', endpoint: 'http://w1.test' },
        { workerId: 'w2', endpoint: 'http://w2.test' },
      ],
      silentLogger()
    );
    transport.unregister('w1');

    await expect(transport.getAvailableWorkers()).resolves.toEqual(['w2']);
  });

  it('should reject unknown workers', async () => {
    const transport = new HTTPPeerTransport([], silentLogger());
    await expect(transport.send('ghost', REQUEST)).rejects.toThrow('Unknown worker: ghost');
  });

  it('should read replies defensively', () => {
    expect(parseWorkerReply({ output: 42 }, REQUEST)).toEqual({
      prompt: REQUEST.prompt,
      requestId: 'req_1',
      output: undefined,
    });
    expect(() => parseWorkerReply('nope', REQUEST)).toThrow('not an object');
  });
});

describe('LocalPeerTransport', () => {
  function createWorker(workerId: string, engine: IInferenceEngine = new EchoEngine()) {
    return SubnetFactory.createWorker(workerId, DEFAULT_SUBNET_CONFIG, {
      inferenceEngine: engine,
      logger: silentLogger(),
    });
  }

  it('should dispatch into in-process workers', async () => {
    const transport = new LocalPeerTransport([createWorker('w1'), createWorker('w2')], silentLogger());

    await expect(transport.getAvailableWorkers()).resolves.toEqual(['w1', 'w2']);
    const response = await transport.send('w2', REQUEST);
    expect(response.requestId).toBe('req_1');
    expect(response.output).toContain('1. ');
  });

  it('should reject when the signal aborts before the worker answers', async () => {
    const hanging: IInferenceEngine = { generate: () => new Promise(() => undefined) };
    const transport = new LocalPeerTransport([createWorker('slow', hanging)], silentLogger());
    const controller = new AbortController();

    const pending = transport.send('slow', { prompt: 'Tell me about the weather', requestId: 'req_2' }, {
      signal: controller.signal,
    });
    controller.abort();

    await expect(pending).rejects.toThrow('Request aborted');
  });

  it('should reject an already aborted signal', async () => {
    const transport = new LocalPeerTransport([createWorker('w1')], silentLogger());
    const controller = new AbortController();
    controller.abort();

    await expect(transport.send('w1', REQUEST, { signal: controller.signal })).rejects.toThrow('Request aborted');
  });
});
