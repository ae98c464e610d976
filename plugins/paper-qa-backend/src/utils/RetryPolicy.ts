/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

/**
 * Retry with exponential backoff, shared by every network boundary that
 * needs it.
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { AppError, describeError } from '../errors';
import { RetrySettings } from '../models';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Retries `AppError`s flagged `retryable`; everything else fails at once.
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof AppError && error.retryable;
}

export interface RetryPolicyOptions extends RetrySettings {
  isRetryable?: (error: unknown) => boolean;
  sleep?: Sleep;
}

export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly isRetryable: (error: unknown) => boolean;
  private readonly sleep: Sleep;

  constructor(options: RetryPolicyOptions, private readonly logger?: Logger) {
    if (options.maxAttempts < 1) {
      throw new RangeError('maxAttempts must be at least 1');
    }
    this.maxAttempts = options.maxAttempts;
    this.baseDelayMs = options.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs;
    this.isRetryable = options.isRetryable ?? isRetryableError;
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Delay before the retry that follows attempt `attempt` (1-based).
   * A server-supplied Retry-After wins when it is longer.
   */
  delayFor(attempt: number, error?: unknown): number {
    const backoff = Math.min(this.baseDelayMs * 2 ** (attempt - 1), this.maxDelayMs);
    const retryAfter =
      error && typeof error === 'object' && 'retryAfterMs' in error && typeof error.retryAfterMs === 'number'
        ? Math.min(error.retryAfterMs, this.maxDelayMs)
        : 0;
    return Math.max(backoff, retryAfter);
  }

  /**
   * Run `operation` until it succeeds, fails terminally, or runs out of
   * attempts. The last error is rethrown unchanged.
   */
  async execute<T>(operation: (attempt: number) => Promise<T>, context = 'operation'): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        if (!this.isRetryable(error) || attempt >= this.maxAttempts) {
          throw error;
        }
        const delay = this.delayFor(attempt, error);
        this.logger?.warn(
          `${context} failed (attempt ${attempt}/${this.maxAttempts}), retrying in ${delay}ms: ${describeError(error)}`,
        );
        await this.sleep(delay);
      }
    }
  }
}
