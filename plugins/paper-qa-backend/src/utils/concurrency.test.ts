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

import { describe, expect, it } from '@jest/globals';
import { mapWithConcurrency } from './concurrency';

describe('mapWithConcurrency', () => {
  it('keeps input order and respects the limit', async () => {
    let active = 0;
    let peak = 0;

    const results = await mapWithConcurrency([5, 1, 4, 2, 3], 2, async item => {
      active++;
      peak = Math.max(peak, active);
      for (let i = 0; i < item; i++) {
        await Promise.resolve();
      }
      active--;
      return item * 2;
    });

    expect(results).toEqual([10, 2, 8, 4, 6]);
    expect(peak).toBe(2);
  });

  it('handles an empty list', async () => {
    await expect(mapWithConcurrency([], 3, async () => 1)).resolves.toEqual([]);
  });

  it('rejects a limit below one', async () => {
    await expect(mapWithConcurrency([1], 0, async item => item)).rejects.toThrow(TypeError);
  });
});
