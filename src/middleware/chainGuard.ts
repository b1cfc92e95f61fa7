/**
 * chainGuard.ts — Refuse chain pointers that would loop or run away.
 *
 * A quiz chain is an unbounded linked list whose next pointer comes from a
 * language model or a remote endpoint, so the controller asks the guard before
 * starting every step. One guard belongs to one chain; nothing is shared.
 *
 * Checks, in order:
 *   1. The URL is a well-formed absolute http(s) URL.
 *   2. The chain has not reached its maximum depth.
 *   3. The URL has not been visited earlier in this chain.
 */

import { ChainGuardError } from '../core/errors';
import { Logger } from '../core/logger';
import { isAbsoluteHttpUrl, sameUrl } from '../core/urls';

const logger = new Logger('ChainGuard');

export class ChainGuard {
  private readonly visited: string[] = [];
  private readonly maxSteps: number;

  constructor(maxSteps: number) {
    this.maxSteps = maxSteps;
  }

  /** Steps admitted so far. */
  get depth(): number {
    return this.visited.length;
  }

  /**
   * Throw a ChainGuardError if `url` may not start a new step; otherwise
   * record it as visited.
   */
  admit(url: string): void {
    if (!isAbsoluteHttpUrl(url)) {
      logger.warn(`Refusing chain pointer "${url}" — not an absolute http(s) URL`);
      throw new ChainGuardError('InvalidNextUrl', url, `Chain URL is not an absolute http(s) URL: ${url}`);
    }

    if (this.visited.length >= this.maxSteps) {
      logger.warn(`Depth limit (${this.maxSteps}) reached — refusing ${url}`);
      throw new ChainGuardError('MaxStepsExceeded', url, `Chain exceeded ${this.maxSteps} steps at ${url}`);
    }

    if (this.visited.some((seen) => sameUrl(seen, url))) {
      logger.warn(`URL already visited in this chain: ${url}`);
      throw new ChainGuardError('ChainLoop', url, `Chain revisits ${url}`);
    }

    this.visited.push(url);
  }
}
