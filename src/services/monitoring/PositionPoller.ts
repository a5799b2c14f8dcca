import {
  Address,
  PollFailurePolicy,
  PollerState,
  PollerStats,
  PositionChange,
  PositionSet,
} from '../../types';
import { toErrorMessage } from '../../errors';
import { logPositionChange, logger } from '../../utils/logger';
import { SleepFn, sleep } from '../../utils/sleep';
import { diffPositionSets, positionSetsEqual } from '../gmx/positionDiff';

export interface PositionSnapshotSource {
  getPositions(address: Address): Promise<PositionSet>;
}

export interface PositionPollerOptions {
  intervalMs: number;
  failurePolicy: PollFailurePolicy;
  // consecutive failed ticks tolerated under 'skip'; 0 = unlimited
  maxConsecutiveFailures: number;
  signal?: AbortSignal;
  sleep?: SleepFn;
}

/**
 * Re-reads one account's positions every `intervalMs` and yields a PositionChange
 * whenever the snapshot differs from the last one seen.
 *
 * The sequence is infinite; it ends on `stop()`, on the abort signal, when the
 * consumer leaves its `for await` loop, or with an error once the poller fails.
 */
class PositionPoller implements AsyncIterable<PositionChange> {
  private readonly controller = new AbortController();

  private readonly sleepFn: SleepFn;

  private state = PollerState.IDLE;

  private started = false;

  private inFlight: Promise<PositionSet> | null = null;

  // Telemetry counters
  private rounds = 0;
  private changes = 0;
  private failedPolls = 0;
  private consecutiveFailures = 0;
  private lastTickDurationMs = 0;

  constructor(
    private readonly source: PositionSnapshotSource,
    private readonly account: Address,
    private readonly options: PositionPollerOptions,
  ) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs < 0) {
      throw new RangeError('Poll interval must be a non-negative number of milliseconds');
    }
    this.sleepFn = options.sleep ?? sleep;

    const { signal } = options;
    if (signal?.aborted) {
      this.controller.abort();
    } else {
      signal?.addEventListener('abort', () => this.stop(), { once: true });
    }
  }

  [Symbol.asyncIterator](): AsyncGenerator<PositionChange, void, undefined> {
    return this.changesGenerator();
  }

  /**
   * Drive the poller in the background, handing each change to `onChange`.
   * Resolves once the poller stops; rejects if it fails and no `onError` is given.
   */
  async start(
    onChange: (change: PositionChange) => Promise<void> | void,
    onError?: (error: unknown) => void,
  ): Promise<void> {
    try {
      for await (const change of this) {
        await onChange(change);
      }
    } catch (error) {
      if (!onError) throw error;
      onError(error);
    }
  }

  stop(): void {
    if (this.controller.signal.aborted) return;
    this.controller.abort();
    logger.info('Position poller stopped', { account: this.account, rounds: this.rounds });
  }

  isStopped(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Resolves once no position read is in flight
   */
  async drain(): Promise<void> {
    if (this.inFlight) {
      await Promise.allSettled([this.inFlight]);
    }
  }

  getState(): PollerState {
    return this.state;
  }

  getStats(): PollerStats {
    return {
      state: this.state,
      rounds: this.rounds,
      changes: this.changes,
      failedPolls: this.failedPolls,
      consecutiveFailures: this.consecutiveFailures,
      lastTickDurationMs: this.lastTickDurationMs,
    };
  }

  private async *changesGenerator(): AsyncGenerator<PositionChange, void, undefined> {
    if (this.started) {
      throw new Error('Position poller can only be iterated once');
    }
    this.started = true;

    const { signal } = this.controller;
    let lastPositions: PositionSet;

    try {
      if (signal.aborted) return;

      this.state = PollerState.INITIALIZING;
      try {
        lastPositions = await this.read();
      } catch (error) {
        this.state = PollerState.FAILED;
        logger.error('Initial position snapshot failed', { account: this.account, error: toErrorMessage(error) });
        throw error;
      }

      this.state = PollerState.WAITING;
      logger.info('Position poller started', {
        account: this.account,
        intervalMs: this.options.intervalMs,
        failurePolicy: this.options.failurePolicy,
        positions: lastPositions.length,
      });

      while (!signal.aborted) {
        const elapsed = await this.sleepFn(this.options.intervalMs, signal);
        if (!elapsed || signal.aborted) break;

        const start = Date.now();
        this.state = PollerState.COMPARING;

        let currentPositions: PositionSet;
        try {
          currentPositions = await this.read();
          this.consecutiveFailures = 0;
        } catch (error) {
          this.handleTickFailure(error);
          continue;
        }

        // a stop during the read discards its result
        if (signal.aborted) break;

        this.rounds++;
        this.lastTickDurationMs = Date.now() - start;
        logger.debug('Position poll completed', {
          account: this.account,
          round: this.rounds,
          positions: currentPositions.length,
          pollDurationMs: this.lastTickDurationMs,
        });

        if (!positionSetsEqual(lastPositions, currentPositions)) {
          const change: PositionChange = {
            account: this.account,
            before: lastPositions,
            after: currentPositions,
            ...diffPositionSets(lastPositions, currentPositions),
            round: this.rounds,
            detectedAt: Date.now(),
          };
          lastPositions = currentPositions;
          this.changes++;
          this.state = PollerState.EMITTING;
          logPositionChange(change);
          yield change;
        }

        this.state = PollerState.WAITING;
      }
    } finally {
      if (this.state !== PollerState.FAILED) {
        this.state = PollerState.STOPPED;
      }
    }
  }

  private async read(): Promise<PositionSet> {
    const pending = this.source.getPositions(this.account);
    this.inFlight = pending;
    try {
      return await pending;
    } finally {
      this.inFlight = null;
    }
  }

  // Throws when the failure policy says the poller is done
  private handleTickFailure(error: unknown): void {
    this.failedPolls++;
    this.consecutiveFailures++;

    const { failurePolicy, maxConsecutiveFailures } = this.options;
    const exhausted = maxConsecutiveFailures > 0 && this.consecutiveFailures >= maxConsecutiveFailures;

    if (failurePolicy === 'abort' || exhausted) {
      this.state = PollerState.FAILED;
      logger.error('Position poller failed', {
        account: this.account,
        consecutiveFailures: this.consecutiveFailures,
        error: toErrorMessage(error),
      });
      throw error;
    }

    this.state = PollerState.WAITING;
    logger.warn('Position poll failed, retrying next interval', {
      account: this.account,
      consecutiveFailures: this.consecutiveFailures,
      error: toErrorMessage(error),
    });
  }
}

export default PositionPoller;
