/**
 * Bounded resolution pool
 *
 * Key ideas:
 * - At most `maxInFlight` jobs run at once; the rest wait in FIFO order.
 * - A job is started from submit() or from the completion of another job,
 *   never re-entrantly from inside pump().
 * - close() drops everything still queued; running jobs finish on their own
 *   (they observe cancellation through their handles).
 * - peakInFlight is kept for diagnostics and tests.
 */

import { assertSchedulingPrecondition } from '../dev/invariant';
import { logger } from '../dev/logger';

type Job = () => Promise<void>;

export type PoolState = {
  inFlight: number;
  queueLength: number;
  peakInFlight: number;
  started: number;
  closed: boolean;
};

export class ResolutionPool {
  private q: Job[] = [];
  private head = 0;

  private inFlight = 0;
  private peakInFlight = 0;
  private started = 0;
  private pumping = false;
  private closed = false;

  private idleWaiters: Array<() => void> = [];

  constructor(
    readonly maxInFlight: number,
    private readonly onJobError: (err: unknown) => void = (err) =>
      logger.error('[Pool] resolution job failed:', err)
  ) {
    assertSchedulingPrecondition(
      Number.isInteger(maxInFlight) && maxInFlight > 0,
      `maxInFlight must be a positive integer, got ${maxInFlight}`
    );
  }

  submit(job: Job): void {
    assertSchedulingPrecondition(
      typeof job === 'function',
      'submit() requires a function'
    );
    if (this.closed) return;
    this.q.push(job);
    this.pump();
  }

  private pump(): void {
    if (this.pumping) return;
    this.pumping = true;
    try {
      while (
        !this.closed &&
        this.inFlight < this.maxInFlight &&
        this.head < this.q.length
      ) {
        const job = this.q[this.head++];
        this.inFlight++;
        this.started++;
        this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
        void this.execute(job);
      }
    } finally {
      this.pumping = false;
      this.compact();
    }
  }

  private async execute(job: Job): Promise<void> {
    try {
      await job();
    } catch (err) {
      this.onJobError(err);
    } finally {
      this.inFlight--;
      this.pump();
      if (this.isIdle()) this.resolveIdle();
    }
  }

  private compact(): void {
    if (this.head >= this.q.length) {
      this.q.length = 0;
      this.head = 0;
    } else if (this.head > 1024) {
      this.q = this.q.slice(this.head);
      this.head = 0;
    }
  }

  isIdle(): boolean {
    return this.inFlight === 0 && (this.closed || this.head >= this.q.length);
  }

  /** Resolves once nothing is running and nothing runnable is queued */
  whenIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Stop accepting work and drop queued jobs; returns how many were dropped */
  close(): number {
    const dropped = this.q.length - this.head;
    this.closed = true;
    this.q.length = 0;
    this.head = 0;
    if (this.isIdle()) this.resolveIdle();
    return dropped;
  }

  getState(): PoolState {
    return {
      inFlight: this.inFlight,
      queueLength: this.q.length - this.head,
      peakInFlight: this.peakInFlight,
      started: this.started,
      closed: this.closed,
    };
  }

  private resolveIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const w of waiters) w();
  }
}
