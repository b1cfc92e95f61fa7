/**
 * deadline.ts — The absolute wall-clock instant by which a chain must finish.
 *
 * The controller creates one Deadline per solve request and hands it to every
 * collaborator. Collaborators never enforce it by interrupting work; they use
 * it to decide whether a new call may start and to clamp the timeout of the
 * call they are about to make.
 */

import { DateTime, Duration } from 'luxon';

export type Clock = () => DateTime;

const systemClock: Clock = () => DateTime.now();

export class Deadline {
  readonly startedAt: DateTime;
  readonly at: DateTime;
  private readonly clock: Clock;

  private constructor(startedAt: DateTime, at: DateTime, clock: Clock) {
    this.startedAt = startedAt;
    this.at = at;
    this.clock = clock;
  }

  /** A deadline `budgetSeconds` from now. */
  static fromBudget(budgetSeconds: number, clock: Clock = systemClock): Deadline {
    const now = clock();
    return new Deadline(now, now.plus({ seconds: budgetSeconds }), clock);
  }

  remaining(): Duration {
    return this.at.diff(this.clock());
  }

  remainingMs(): number {
    return this.remaining().as('milliseconds');
  }

  elapsedMs(): number {
    return this.clock().diff(this.startedAt).as('milliseconds');
  }

  isExpired(): boolean {
    return this.remainingMs() <= 0;
  }

  /**
   * Timeout for a call about to start: the configured local timeout, capped by
   * the remaining budget but never below `floorMs`, so an admitted call always
   * gets a usable window.
   */
  clampTimeout(localTimeoutMs: number, floorMs: number): number {
    const remaining = Math.max(0, Math.floor(this.remainingMs()));
    return Math.min(localTimeoutMs, Math.max(remaining, floorMs));
  }

  /** e.g. "42.3s left" — for log lines. */
  describe(): string {
    const seconds = this.remainingMs() / 1000;
    return seconds > 0 ? `${seconds.toFixed(1)}s left` : `expired ${(-seconds).toFixed(1)}s ago`;
  }
}
