import { describe, expect, it, jest } from '@jest/globals';
import PositionPoller, { PositionPollerOptions } from '../../src/services/monitoring/PositionPoller';
import { PollerState, PositionChange, PositionSet } from '../../src/types';
import { SleepFn } from '../../src/utils/sleep';
import { createBtcShort, createEthLong, createPositionSet } from '../utils/positionFactory';
import { createSnapshotSequence, flushPromises } from '../utils/testHelpers';
import { TEST_ACCOUNTS } from '../utils/testData';

const ACCOUNT = TEST_ACCOUNTS[0];

// no real waiting; reports an abort like the real sleep does
const instantSleep: SleepFn = async (_ms, signal) => !signal?.aborted;

const eth = createEthLong();
const btc = createBtcShort();
const S0 = createPositionSet(eth);
const S1 = createPositionSet(eth, btc);
const S2 = createPositionSet(btc);

const buildPoller = (
  snapshots: Array<PositionSet | Error>,
  options: Partial<PositionPollerOptions> = {},
) => {
  const source = createSnapshotSequence(snapshots);
  const poller = new PositionPoller(source, ACCOUNT, {
    intervalMs: 10_000,
    failurePolicy: 'skip',
    maxConsecutiveFailures: 0,
    sleep: instantSleep,
    ...options,
  });
  return { poller, source };
};

const take = async (poller: PositionPoller, count: number): Promise<PositionChange[]> => {
  const changes: PositionChange[] = [];
  for await (const change of poller) {
    changes.push(change);
    if (changes.length === count) break;
  }
  return changes;
};

describe('PositionPoller', () => {
  it('yields one pair per change and nothing for unchanged reads', async () => {
    const { poller, source } = buildPoller([S0, S1, S1, S2]);

    const changes = await take(poller, 2);

    expect(changes.map(({ before, after }) => [before, after])).toEqual([
      [S0, S1],
      [S1, S2],
    ]);
    expect(changes[0]).toMatchObject({ account: ACCOUNT, added: [btc], removed: [], modified: [], round: 1 });
    expect(changes[1]).toMatchObject({ added: [], removed: [eth], modified: [], round: 3 });
    expect(source.callCount()).toBe(4);
    expect(poller.getState()).toBe(PollerState.STOPPED);
    expect(poller.getStats()).toMatchObject({ rounds: 3, changes: 2, failedPolls: 0 });
  });

  it('reports a closed position as removed', async () => {
    const { poller } = buildPoller([S0, []]);

    const [change] = await take(poller, 1);

    expect(change.before).toEqual([eth]);
    expect(change.after).toEqual([]);
    expect(change.removed).toEqual([eth]);
    expect(change.added).toEqual([]);
  });

  it('ignores mark price movement', async () => {
    const moved = createPositionSet(createEthLong({ markPrice: 2_600, percentProfit: 150 }));
    const { poller } = buildPoller([S0, moved, S1]);

    const [change] = await take(poller, 1);

    expect(change.before).toBe(S0);
    expect(change.after).toBe(S1);
    expect(change.round).toBe(2);
  });

  it('skips a failed read and keeps the last snapshot', async () => {
    const { poller } = buildPoller([S0, new Error('rpc timeout'), S1]);

    const [change] = await take(poller, 1);

    expect(change.before).toBe(S0);
    expect(change.after).toBe(S1);
    expect(poller.getStats()).toMatchObject({ rounds: 1, failedPolls: 1, consecutiveFailures: 0 });
  });

  it('fails on the first error under the abort policy', async () => {
    const failure = new Error('rpc down');
    const { poller } = buildPoller([S0, failure], { failurePolicy: 'abort' });

    await expect(take(poller, 1)).rejects.toBe(failure);
    expect(poller.getState()).toBe(PollerState.FAILED);
  });

  it('fails after too many consecutive errors', async () => {
    const failure = new Error('rpc down');
    const { poller, source } = buildPoller([S0, failure], { maxConsecutiveFailures: 2 });

    await expect(take(poller, 1)).rejects.toBe(failure);
    expect(source.callCount()).toBe(3);
    expect(poller.getStats()).toMatchObject({
      state: PollerState.FAILED,
      failedPolls: 2,
      consecutiveFailures: 2,
    });
  });

  it('fails when the initial snapshot cannot be read', async () => {
    const failure = new Error('rpc down');
    const { poller, source } = buildPoller([failure]);

    await expect(take(poller, 1)).rejects.toBe(failure);
    expect(poller.getState()).toBe(PollerState.FAILED);
    expect(source.callCount()).toBe(1);
  });

  it('stops from inside a change handler', async () => {
    const { poller, source } = buildPoller([S0, S1, S2]);
    const onChange = jest.fn((_change: PositionChange) => poller.stop());

    await poller.start(onChange);

    expect(onChange).toHaveBeenCalledTimes(1);
    expect(source.callCount()).toBe(2);
    expect(poller.isStopped()).toBe(true);
    expect(poller.getState()).toBe(PollerState.STOPPED);
  });

  it('hands failures to the error callback', async () => {
    const failure = new Error('rpc down');
    const { poller } = buildPoller([S0, failure], { failurePolicy: 'abort' });
    const onError = jest.fn();

    await poller.start(() => undefined, onError);

    expect(onError).toHaveBeenCalledWith(failure);
  });

  it('stops when the abort signal fires', async () => {
    const external = new AbortController();
    let sleeps = 0;
    const sleep: SleepFn = async (_ms, signal) => {
      sleeps++;
      if (sleeps === 2) external.abort();
      return !signal?.aborted;
    };
    const { poller, source } = buildPoller([S0, S1, S2], { signal: external.signal, sleep });

    const changes = await take(poller, 5);

    expect(changes).toHaveLength(1);
    expect(source.callCount()).toBe(2);
    expect(poller.getState()).toBe(PollerState.STOPPED);
  });

  it('does nothing when the signal has already fired', async () => {
    const external = new AbortController();
    external.abort();
    const { poller, source } = buildPoller([S0, S1], { signal: external.signal });

    await expect(take(poller, 1)).resolves.toEqual([]);
    expect(source.callCount()).toBe(0);
  });

  it('discards a read that completes after stop', async () => {
    let calls = 0;
    const poller: PositionPoller = new PositionPoller(
      {
        getPositions: async () => {
          calls++;
          if (calls === 2) poller.stop();
          return calls === 1 ? S0 : S1;
        },
      },
      ACCOUNT,
      { intervalMs: 10_000, failurePolicy: 'skip', maxConsecutiveFailures: 0, sleep: instantSleep },
    );

    await expect(take(poller, 1)).resolves.toEqual([]);
    expect(calls).toBe(2);
  });

  it('drains an in-flight read', async () => {
    let release: (positions: PositionSet) => void = () => undefined;
    let calls = 0;
    const poller = new PositionPoller(
      {
        getPositions: (): Promise<PositionSet> => {
          calls++;
          if (calls === 1) return Promise.resolve(S0);
          return new Promise<PositionSet>((resolve) => {
            release = resolve;
          });
        },
      },
      ACCOUNT,
      { intervalMs: 10_000, failurePolicy: 'skip', maxConsecutiveFailures: 0, sleep: instantSleep },
    );

    const next = poller[Symbol.asyncIterator]().next();
    await flushPromises();
    expect(calls).toBe(2);

    poller.stop();
    let drained = false;
    const drain = poller.drain().then(() => {
      drained = true;
    });
    await flushPromises();
    expect(drained).toBe(false);

    release(S1);
    await drain;
    await expect(next).resolves.toEqual({ done: true, value: undefined });
  });

  it('can only be iterated once', async () => {
    const { poller } = buildPoller([S0, S1]);
    await take(poller, 1);

    await expect(poller[Symbol.asyncIterator]().next()).rejects.toThrow('Position poller can only be iterated once');
  });

  it('rejects a negative interval', () => {
    expect(() => buildPoller([S0], { intervalMs: -1 })).toThrow(RangeError);
  });
});
