// Request/response correlation for OSC
//
// Live answers on the same address it was asked on and carries no request
// identifier, so replies are matched to requests through one FIFO queue per
// address: the Nth expectation registered on an address is resolved by the
// Nth reply received on it.

import { MAX_TIMEOUT } from '../config.js';
import { CancelledError, TimeoutError, ValidationError } from '../errors.js';
import type { OscValue } from '../types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('osc.correlator');

/**
 * Default timeout for waiting on responses
 */
export const DEFAULT_RESPONSE_TIMEOUT = 5000; // 5 seconds

/**
 * Pending wait owned by the correlator until resolved, timed out or cancelled
 */
interface PendingWait {
  readonly address: string;
  readonly createdAt: Date;
  resolve: (args: OscValue[]) => void;
  reject: (error: Error) => void;
  settled: boolean;
  timer: ReturnType<typeof setTimeout> | null;
}

/**
 * Handle returned by expectResponse
 */
export interface PendingResponse {
  readonly address: string;
  readonly createdAt: Date;
  /** Resolves with the reply args; rejects with TimeoutError or CancelledError */
  readonly response: Promise<OscValue[]>;
  isSettled(): boolean;
  /**
   * Reject the wait and remove it from its queue
   * @returns false when the wait had already settled
   */
  cancel(reason?: Error): boolean;
}

/**
 * FIFO correlator of OSC requests and responses, one queue per address
 *
 * Every queue mutation is synchronous, so on the single event loop append,
 * pop and drain are atomic with respect to each other and no state is held
 * across an await.
 */
export class ResponseCorrelator {
  private readonly pending = new Map<string, PendingWait[]>();
  private readonly defaultTimeout: number;

  constructor(defaultTimeout: number = DEFAULT_RESPONSE_TIMEOUT) {
    validateTimeout(defaultTimeout);
    this.defaultTimeout = defaultTimeout;
  }

  /**
   * Register expectation for a response on an address
   * Returns immediately; the wait is queued behind earlier ones for the same address
   *
   * @param timeoutMs - When given, the wait rejects with TimeoutError and leaves
   * its queue after this many milliseconds
   */
  expectResponse(address: string, timeoutMs?: number): PendingResponse {
    if (timeoutMs !== undefined) {
      validateTimeout(timeoutMs);
    }

    const wait: PendingWait = {
      address,
      createdAt: new Date(),
      resolve: () => undefined,
      reject: () => undefined,
      settled: false,
      timer: null,
    };
    const response = new Promise<OscValue[]>((resolve, reject) => {
      wait.resolve = resolve;
      wait.reject = reject;
    });

    const queue = this.pending.get(address);
    if (queue === undefined) {
      this.pending.set(address, [wait]);
    } else {
      queue.push(wait);
    }

    if (timeoutMs !== undefined) {
      wait.timer = setTimeout(() => this.expire(wait, timeoutMs), timeoutMs);
    }

    logger.debug('Registered pending request', { address });

    return {
      address,
      createdAt: wait.createdAt,
      response,
      isSettled: () => wait.settled,
      cancel: (reason?: Error) => this.cancel(wait, reason),
    };
  }

  /**
   * Handle an incoming response for an address
   * @returns true if a pending request was matched, false otherwise
   */
  handleResponse(address: string, args: OscValue[]): boolean {
    const queue = this.pending.get(address);
    if (queue === undefined || queue.length === 0) {
      logger.debug('No pending request for response', { address });
      return false;
    }

    // Oldest pending request (FIFO)
    const wait = queue.shift();
    if (queue.length === 0) {
      this.pending.delete(address);
    }
    if (wait === undefined) {
      return false;
    }

    if (!this.settle(wait)) {
      logger.warn('Pending request already settled', { address });
      return false;
    }

    wait.resolve(args);
    logger.debug('Resolved pending request', { address, args });
    return true;
  }

  /**
   * Wait for a response on an address
   * Convenience combination of expectResponse and await, with the default
   * timeout when none is given
   *
   * @throws TimeoutError - the wait has already left its queue
   */
  async waitForResponse(address: string, timeoutMs?: number): Promise<OscValue[]> {
    return this.expectResponse(address, timeoutMs ?? this.defaultTimeout).response;
  }

  /**
   * Cancel all pending requests (used on disconnect)
   * @returns Number of waits that were cancelled
   */
  cancelAll(reason?: Error): number {
    const waits = Array.from(this.pending.values()).flat();
    this.pending.clear();

    let cancelled = 0;
    for (const wait of waits) {
      if (this.settle(wait)) {
        wait.reject(reason ?? new CancelledError(wait.address, `Request on ${wait.address} cancelled by disconnect`));
        cancelled += 1;
      }
    }

    if (cancelled > 0) {
      logger.debug('Cancelled all pending requests', { cancelled });
    }
    return cancelled;
  }

  /**
   * Number of outstanding waits, for one address or overall
   */
  pendingCount(address?: string): number {
    if (address !== undefined) {
      return this.pending.get(address)?.length ?? 0;
    }
    let total = 0;
    for (const queue of this.pending.values()) {
      total += queue.length;
    }
    return total;
  }

  /**
   * Addresses with at least one outstanding wait
   */
  pendingAddresses(): string[] {
    return Array.from(this.pending.keys());
  }

  getDefaultTimeout(): number {
    return this.defaultTimeout;
  }

  // ==========================================================================
  // Private
  // ==========================================================================

  /**
   * Mark a wait settled and stop its timer
   * @returns false when it was already settled
   */
  private settle(wait: PendingWait): boolean {
    if (wait.settled) {
      return false;
    }
    wait.settled = true;
    if (wait.timer !== null) {
      clearTimeout(wait.timer);
      wait.timer = null;
    }
    return true;
  }

  private remove(wait: PendingWait): void {
    const queue = this.pending.get(wait.address);
    if (queue === undefined) {
      return;
    }
    const index = queue.indexOf(wait);
    if (index !== -1) {
      queue.splice(index, 1);
    }
    if (queue.length === 0) {
      this.pending.delete(wait.address);
    }
  }

  private expire(wait: PendingWait, timeoutMs: number): void {
    if (!this.settle(wait)) {
      return;
    }
    // Evict before rejecting so a late reply can't match this stale wait
    this.remove(wait);
    logger.warn('Request timed out', { address: wait.address, timeout: timeoutMs });
    wait.reject(new TimeoutError(wait.address, timeoutMs));
  }

  private cancel(wait: PendingWait, reason?: Error): boolean {
    if (!this.settle(wait)) {
      return false;
    }
    this.remove(wait);
    wait.reject(reason ?? new CancelledError(wait.address));
    return true;
  }
}

function validateTimeout(timeoutMs: number): void {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ValidationError('timeout', 'timeout must be a positive number of milliseconds', timeoutMs, '> 0');
  }
  if (timeoutMs > MAX_TIMEOUT) {
    throw new ValidationError('timeout', `timeout must be at most ${MAX_TIMEOUT}ms`, timeoutMs, `<= ${MAX_TIMEOUT}`);
  }
}
