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

import { describe, expect, it, jest } from '@jest/globals';
import { ContractViolationError, SourceFetchError } from '../errors';
import { RetryPolicy, Sleep } from './RetryPolicy';

const rateLimited = (retryAfterMs?: number) =>
  new SourceFetchError('Download failed: HTTP 429', { status: 429, retryable: true, retryAfterMs });

function createPolicy(maxAttempts = 3) {
  const sleep = jest.fn<Sleep>().mockResolvedValue(undefined);
  const policy = new RetryPolicy({ maxAttempts, baseDelayMs: 1000, maxDelayMs: 30000, sleep });
  return { policy, sleep };
}

describe('RetryPolicy', () => {
  it('backs off exponentially up to the cap', () => {
    const { policy } = createPolicy();

    expect([1, 2, 3, 6].map(attempt => policy.delayFor(attempt))).toEqual([1000, 2000, 4000, 30000]);
  });

  it('honours a longer Retry-After', () => {
    const { policy } = createPolicy();

    expect(policy.delayFor(1, rateLimited(5000))).toBe(5000);
    expect(policy.delayFor(3, rateLimited(500))).toBe(4000);
  });

  it('retries retryable failures until success', async () => {
    const { policy, sleep } = createPolicy();
    const operation = jest
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(rateLimited())
      .mockRejectedValueOnce(rateLimited())
      .mockResolvedValue('ok');

    await expect(policy.execute(operation)).resolves.toBe('ok');
    expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it('rethrows the last error once attempts run out', async () => {
    const { policy } = createPolicy(2);
    const last = rateLimited();
    const operation = jest
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(rateLimited())
      .mockRejectedValueOnce(last);

    await expect(policy.execute(operation)).rejects.toBe(last);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('does not retry terminal errors', async () => {
    const { policy, sleep } = createPolicy();
    const operation = jest
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValue(new ContractViolationError('bad input'));

    await expect(policy.execute(operation)).rejects.toThrow(ContractViolationError);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('requires at least one attempt', () => {
    expect(() => new RetryPolicy({ maxAttempts: 0, baseDelayMs: 1, maxDelayMs: 1 })).toThrow(RangeError);
  });
});
