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
 * Minimum-interval gate shared by every caller of an external source.
 * Callers acquire in arrival order; each acquisition waits until at least
 * `minIntervalMs` has passed since the previous one was granted.
 *
 * @packageDocumentation
 */

import { sleep as defaultSleep, Sleep } from './RetryPolicy';

export class RateGate {
  private lastGrant = Number.NEGATIVE_INFINITY;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: () => number = Date.now,
    private readonly sleep: Sleep = defaultSleep,
  ) {}

  acquire(): Promise<void> {
    const turn = this.queue.then(async () => {
      const wait = this.lastGrant + this.minIntervalMs - this.now();
      if (wait > 0) {
        await this.sleep(wait);
      }
      this.lastGrant = this.now();
    });
    // A rejected sleep must not wedge later callers
    this.queue = turn.catch(() => undefined);
    return turn;
  }
}
