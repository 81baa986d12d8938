/**
 * OpenAIJudgeOracle Tests
 * 
 * The HTTP client is a real axios instance with `post` stubbed
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import axios, { AxiosHeaders, AxiosInstance, AxiosResponse } from 'axios';
import { OpenAIJudgeOracle, buildJudgePrompt, stripCodeFence } from '../../adapters/judge/OpenAIJudgeOracle';
import { BatchScoringService } from '../../BatchScoringService';
import { silentLogger } from '../helpers/fakes';

function chatReply(content: string | null): AxiosResponse<unknown> {
  return {
    data: { choices: [{ message: { role: 'assistant', content } }] },
    status: 200,
    statusText: 'OK',
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}

const REQUEST = { prompt: 'How do I relax?', reference: 'Breathe slowly.', candidates: ['first', 'second'] };

describe('OpenAIJudgeOracle', () => {
  let client: AxiosInstance;
  let oracle: OpenAIJudgeOracle;

  beforeEach(() => {
    client = axios.create();
    oracle = new OpenAIJudgeOracle({ apiKey: 'test-secret', model: 'judge-model' }, silentLogger(), client);
  });

  it('should post the judge prompt and return clamped scores', async () => {
    const post = jest.spyOn(client, 'post').mockResolvedValue(chatReply('{"scores": [0.9, 1.4]}'));

    await expect(oracle.score(REQUEST)).resolves.toEqual([0.9, 1]);
    expect(post).toHaveBeenCalledWith('/chat/completions', {
      model: 'judge-model',
      messages: [
        { role: 'system', content: 'You are a strict and fair judge for therapy responses.' },
        { role: 'user', content: buildJudgePrompt(REQUEST) },
      ],
    });
  });

  it('should accept JSON wrapped in a markdown fence', async () => {
    jest.spyOn(client, 'post').mockResolvedValue(chatReply('```json\n{"scores": [0.5, -0.2]}\n```'));

    await expect(oracle.score(REQUEST)).resolves.toEqual([0.5, 0]);
  });

  it('should reject a reply without content', async () => {
    jest.spyOn(client, 'post').mockResolvedValue(chatReply(null));

    await expect(oracle.score(REQUEST)).rejects.toThrow('Judge reply has no message content');
  });

  it('should reject a reply that is not JSON', async () => {
    jest.spyOn(client, 'post').mockResolvedValue(chatReply('They are both fine.'));

    await expect(oracle.score(REQUEST)).rejects.toThrow('Judge reply is not valid JSON');
  });

  it('should reject a reply with the wrong shape', async () => {
    jest.spyOn(client, 'post').mockResolvedValue(chatReply('{"scores": "high"}'));

    await expect(oracle.score(REQUEST)).rejects.toThrow('Judge reply failed validation');
  });

  it('should not call the API for an empty batch', async () => {
    const post = jest.spyOn(client, 'post');

    await expect(oracle.score({ ...REQUEST, candidates: [] })).resolves.toEqual([]);
    expect(post).not.toHaveBeenCalled();
  });

  it('should zero-score a batch through the scorer when the API fails', async () => {
    jest.spyOn(client, 'post').mockRejectedValue(new Error('Request failed with status code 500'));
    const scorer = new BatchScoringService(oracle, {}, silentLogger());

    const scores = await scorer.scoreAll('p', 'r', [
      { workerId: 'a', output: 'first' },
      { workerId: 'b', output: 'second' },
    ]);

    expect(Array.from(scores.values())).toEqual([0, 0]);
  });

  describe('helpers', () => {
    it('should number candidates in the judge prompt', () => {
      const prompt = buildJudgePrompt(REQUEST);

      expect(prompt).toContain('\nPrompt: How do I relax?\nBase Response: Breathe slowly.\n');
      expect(prompt).toContain('\nTherapist Responses:\nTherapist 1: first\nTherapist 2: second\n');
    });

    it('should strip fences with or without a language tag', () => {
      expect(stripCodeFence('```json\n{"a":1}\n```')).toBe('{"a":1}');
      expect(stripCodeFence('```\n{"a":1}\n```')).toBe('{"a":1}');
      expect(stripCodeFence('  {"a":1} ')).toBe('{"a":1}');
    });
  });
});
