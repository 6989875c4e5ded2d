import { describe, expect, it, vi } from 'vitest';
import { silentLogger } from '../src/logger.js';
import { createProgressReporter } from '../src/progress.js';
import { createDeferred } from './helpers.js';

describe('ProgressReporter', () => {
  it('only sends increasing values and caps them below completion', async () => {
    const sent: number[] = [];
    const reporter = createProgressReporter(async (percent) => {
      sent.push(percent);
    }, { minIntervalMs: 0, minStep: 1, logger: silentLogger() });

    reporter.report(5);
    reporter.report(3);
    reporter.report(150);

    await vi.waitFor(() => expect(sent).toEqual([5, 99]));
    expect(reporter.lastReported).toBe(99);
  });

  it('drops updates that arrive too soon or move too little', async () => {
    let now = 0;
    const sent: number[] = [];
    const reporter = createProgressReporter(async (percent) => {
      sent.push(percent);
    }, { minIntervalMs: 1_000, minStep: 5, logger: silentLogger(), now: () => now });

    reporter.report(10);
    now = 100;
    reporter.report(50);
    now = 1_500;
    reporter.report(12);
    reporter.report(20);

    await vi.waitFor(() => expect(sent).toEqual([10, 20]));
    expect(reporter.lastReported).toBe(20);
  });

  it('collapses values that arrive while a send is in flight into the newest one', async () => {
    const gate = createDeferred();
    const sent: number[] = [];
    const reporter = createProgressReporter(async (percent) => {
      sent.push(percent);
      if (sent.length === 1) {
        await gate.promise;
      }
    }, { minIntervalMs: 0, minStep: 1, logger: silentLogger() });

    reporter.report(10);
    reporter.report(20);
    reporter.report(30);
    reporter.report(40);
    await vi.waitFor(() => expect(sent).toEqual([10]));

    gate.release();

    await vi.waitFor(() => expect(sent).toEqual([10, 40]));
  });

  it('waits for the in-flight send on close and sends nothing afterwards', async () => {
    const gate = createDeferred();
    const sent: number[] = [];
    const reporter = createProgressReporter(async (percent) => {
      sent.push(percent);
      await gate.promise;
    }, { minIntervalMs: 0, minStep: 1, logger: silentLogger() });

    reporter.report(10);
    reporter.report(20);
    await vi.waitFor(() => expect(sent).toEqual([10]));

    let closed = false;
    const closing = reporter.close().then(() => {
      closed = true;
    });
    await Promise.resolve();
    expect(closed).toBe(false);

    gate.release();
    await closing;
    reporter.report(60);
    await Promise.resolve();

    expect(sent).toEqual([10]);
  });

  it('keeps going after a failed send', async () => {
    const attempts: number[] = [];
    const reporter = createProgressReporter(async (percent) => {
      attempts.push(percent);
      if (attempts.length === 1) {
        throw new Error('message edit rejected');
      }
    }, { minIntervalMs: 0, minStep: 1, logger: silentLogger() });

    reporter.report(10);
    await vi.waitFor(() => expect(attempts).toEqual([10]));
    reporter.report(20);

    await vi.waitFor(() => expect(attempts).toEqual([10, 20]));
  });
});
