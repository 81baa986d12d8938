/**
 * RoundScheduler Tests
 */

import { describe, it, expect } from '@jest/globals';
import { RoundScheduler, RoundRunner } from '../RoundScheduler';
import { RoundReport } from '../types';
import { deferred, flushPromises, silentLogger } from './helpers/fakes';

function skippedReport(roundId: number): RoundReport {
  return {
    round: { roundId, requestId: `req_${roundId}`, prompt: '', referenceAnswer: '', workerIds: [], createdAt: 0 },
    status: 'skipped',
    skipReason: 'No workers available',
    candidates: [],
    qualityScores: new Map(),
    records: [],
    incentives: new Map(),
    completedAt: 0,
  };
}

class CountingRunner implements RoundRunner {
  calls = 0;

  async runRound(): Promise<RoundReport> {
    this.calls++;
    return skippedReport(this.calls);
  }
}

describe('RoundScheduler', () => {
  it('should run rounds back to back until maxRounds', async () => {
    const runner = new CountingRunner();
    const completed: number[] = [];
    const scheduler = new RoundScheduler(
      runner,
      { intervalMs: 0, maxRounds: 3 },
      (report) => completed.push(report.round.roundId),
      silentLogger()
    );

    scheduler.start();
    await scheduler.whenStopped();

    expect(runner.calls).toBe(3);
    expect(completed).toEqual([1, 2, 3]);
    expect(scheduler.isRunning()).toBe(false);
  });

  it('should cut the wait short on stop', async () => {
    const runner = new CountingRunner();
    const scheduler = new RoundScheduler(runner, { intervalMs: 60_000 }, undefined, silentLogger());

    scheduler.start();
    await flushPromises();
    await scheduler.stop();

    expect(runner.calls).toBe(1);
    expect(scheduler.getRoundsRun()).toBe(1);
  });

  it('should let the in-flight round finish before stop resolves', async () => {
    const gate = deferred<RoundReport>();
    const runner: RoundRunner = { runRound: () => gate.promise };
    const scheduler = new RoundScheduler(runner, { intervalMs: 60_000 }, undefined, silentLogger());

    scheduler.start();
    let stopped = false;
    const stopping = scheduler.stop().then(() => {
      stopped = true;
    });
    await flushPromises();
    expect(stopped).toBe(false);

    gate.resolve(skippedReport(1));
    await stopping;
    expect(scheduler.getRoundsRun()).toBe(1);
  });

  it('should keep going after a round throws', async () => {
    let calls = 0;
    const runner: RoundRunner = {
      runRound: async () => {
        calls++;
        if (calls === 1) {
          throw new Error('unexpected');
        }
        return skippedReport(calls);
      },
    };
    const scheduler = new RoundScheduler(runner, { intervalMs: 0, maxRounds: 2 }, undefined, silentLogger());

    scheduler.start();
    await scheduler.whenStopped();

    expect(calls).toBe(2);
  });

  it('should ignore a second start', async () => {
    const runner = new CountingRunner();
    const scheduler = new RoundScheduler(runner, { intervalMs: 0, maxRounds: 1 }, undefined, silentLogger());

    scheduler.start();
    scheduler.start();
    await scheduler.whenStopped();

    expect(runner.calls).toBe(1);
  });

  it('should reject a negative interval', () => {
    expect(() => new RoundScheduler(new CountingRunner(), { intervalMs: -1 }, undefined, silentLogger())).toThrow(
      'non-negative'
    );
  });
});
