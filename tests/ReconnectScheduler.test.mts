/**
 * Unit tests for the reconnection backoff
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ReconnectScheduler, abortableSleep } from '../lib/connection/ReconnectScheduler.mjs';
import type { SleepFunction } from '../lib/types.mjs';
import { ManualSleep, RecordingSink, waitImmediate } from './helpers/testing.mjs';

function failingReconnect() {
  const state = { calls: 0 };
  const reconnect = async () => {
    state.calls += 1;
    throw new Error('panel offline');
  };
  return { state, reconnect };
}

describe('ReconnectScheduler', () => {
  describe('delayFor', () => {
    it('follows the default schedule and repeats the last delay', () => {
      const scheduler = new ReconnectScheduler(async () => undefined, {}, new ManualSleep().sleep, new RecordingSink());

      assert.deepEqual(
        [0, 1, 2, 3, 4, 5, 6].map((index) => scheduler.delayFor(index)),
        [5000, 10000, 20000, 40000, 60000, 120000, 120000]
      );
      assert.equal(scheduler.delayFor(40), 120000);
    });
  });

  describe('schedule', () => {
    it('backs off 5, 10 and 20 seconds over consecutive failures', async () => {
      const sleep = new ManualSleep();
      const { state, reconnect } = failingReconnect();
      const scheduler = new ReconnectScheduler(reconnect, {}, sleep.sleep, new RecordingSink());

      scheduler.schedule();
      await sleep.advance();
      await sleep.advance();

      assert.deepEqual(sleep.delays, [5000, 10000, 20000]);
      assert.equal(scheduler.attempts, 3);
      assert.equal(state.calls, 2);

      scheduler.cancel();
    });

    it('logs each attempt before sleeping', () => {
      const sleep = new ManualSleep();
      const sink = new RecordingSink();
      const scheduler = new ReconnectScheduler(async () => undefined, {}, sleep.sleep, sink);

      scheduler.schedule();

      assert.deepEqual(sink.messages('log'), [
        '[ReconnectScheduler] Attempting to reconnect in 5 seconds (attempt 1)...',
      ]);
      scheduler.cancel();
    });

    it('keeps a single outstanding task', async () => {
      const sleep = new ManualSleep();
      let calls = 0;
      const scheduler = new ReconnectScheduler(
        async () => {
          calls += 1;
        },
        {},
        sleep.sleep,
        new RecordingSink()
      );

      scheduler.schedule();
      scheduler.schedule();

      assert.deepEqual(sleep.delays, [5000]);
      assert.equal(scheduler.attempts, 1);
      assert.equal(scheduler.isPending(), true);

      await sleep.advance();

      assert.equal(calls, 1);
      assert.equal(scheduler.isPending(), false);
      assert.equal(sleep.pendingCount, 0);
    });

    it('resets the counter after a successful reconnection', async () => {
      const sleep = new ManualSleep();
      const sink = new RecordingSink();
      const outcomes = ['fail', 'ok'];
      const scheduler = new ReconnectScheduler(
        async () => {
          if (outcomes.shift() === 'fail') {
            throw new Error('panel offline');
          }
        },
        {},
        sleep.sleep,
        sink
      );

      scheduler.schedule();
      await sleep.advance();
      await sleep.advance();

      assert.equal(scheduler.attempts, 0);
      assert.equal(scheduler.isPending(), false);
      assert.ok(
        sink.messages('log').includes('[ReconnectScheduler] Reconnected successfully after 2 attempts')
      );

      scheduler.schedule();

      assert.deepEqual(sleep.delays, [5000, 10000, 5000]);
      scheduler.cancel();
    });

    it('keeps retrying at the last delay after max attempts and logs a notice', async () => {
      const sleep = new ManualSleep();
      const sink = new RecordingSink();
      const { reconnect } = failingReconnect();
      const scheduler = new ReconnectScheduler(
        reconnect,
        { delays: [1000, 2000], maxAttempts: 2 },
        sleep.sleep,
        sink
      );

      scheduler.schedule();
      await sleep.advance();
      assert.deepEqual(sink.messages('warn'), []);

      await sleep.advance();

      assert.deepEqual(sleep.delays, [1000, 2000, 2000]);
      assert.equal(scheduler.isPending(), true);
      assert.deepEqual(sink.messages('warn'), [
        '[ReconnectScheduler] Max reconnection attempts (2) reached. Will continue retrying with max delay (2s).',
      ]);
      assert.deepEqual(sink.messages('error'), [
        '[ReconnectScheduler] Reconnection failed (attempt 1): panel offline',
        '[ReconnectScheduler] Reconnection failed (attempt 2): panel offline',
      ]);

      scheduler.cancel();
    });

    it('reschedules when the sleep itself fails', async () => {
      const delays: number[] = [];
      const brokenOnce: SleepFunction = (ms) => {
        delays.push(ms);
        if (delays.length === 1) {
          return Promise.reject(new Error('timer broken'));
        }
        return new Promise<void>(() => undefined);
      };
      const { state, reconnect } = failingReconnect();
      const scheduler = new ReconnectScheduler(reconnect, {}, brokenOnce, new RecordingSink());

      scheduler.schedule();
      await waitImmediate();

      assert.deepEqual(delays, [5000, 10000]);
      assert.equal(state.calls, 0);
      assert.equal(scheduler.isPending(), true);

      scheduler.cancel();
    });
  });

  describe('cancel', () => {
    it('aborts the sleep and schedules nothing further', async () => {
      const sleep = new ManualSleep();
      const sink = new RecordingSink();
      const { state, reconnect } = failingReconnect();
      const scheduler = new ReconnectScheduler(reconnect, {}, sleep.sleep, sink);

      scheduler.schedule();
      scheduler.cancel();
      await waitImmediate();

      assert.equal(scheduler.isPending(), false);
      assert.equal(sleep.pendingCount, 0);
      assert.deepEqual(sleep.delays, [5000]);
      assert.equal(state.calls, 0);
      assert.ok(sink.messages('log').includes('[ReconnectScheduler] Cancelling pending reconnection'));
    });

    it('ignores the outcome of an attempt already in flight', async () => {
      const sleep = new ManualSleep();
      const sink = new RecordingSink();
      const inFlight: Array<(error: Error) => void> = [];
      const scheduler = new ReconnectScheduler(
        () =>
          new Promise<void>((_resolve, reject) => {
            inFlight.push(reject);
          }),
        {},
        sleep.sleep,
        sink
      );

      scheduler.schedule();
      await sleep.advance();
      assert.equal(inFlight.length, 1);

      scheduler.cancel();
      inFlight.forEach((reject) => reject(new Error('late failure')));
      await waitImmediate();

      assert.deepEqual(sleep.delays, [5000]);
      assert.equal(scheduler.isPending(), false);
      assert.deepEqual(sink.messages('error'), []);
    });

    it('is a no-op when nothing is pending', () => {
      const sink = new RecordingSink();
      const scheduler = new ReconnectScheduler(async () => undefined, {}, new ManualSleep().sleep, sink);

      scheduler.cancel();

      assert.deepEqual(sink.lines, []);
    });
  });
});

describe('abortableSleep', () => {
  it('resolves after the delay', async () => {
    await abortableSleep(1, new AbortController().signal);
  });

  it('rejects with the abort reason', async () => {
    const controller = new AbortController();
    const pending = abortableSleep(60_000, controller.signal);

    controller.abort(new Error('stop waiting'));

    await assert.rejects(pending, /stop waiting/);
  });

  it('rejects at once for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort(new Error('already stopped'));

    await assert.rejects(abortableSleep(60_000, controller.signal), /already stopped/);
  });
});
