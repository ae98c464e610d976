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
import { createPaper } from '../testing';
import { InMemoryPaperRegistry } from './InMemoryPaperRegistry';

describe('InMemoryPaperRegistry', () => {
  it('stores and returns papers by id', () => {
    const registry = new InMemoryPaperRegistry();
    registry.set(createPaper('p1'));

    expect(registry.has('p1')).toBe(true);
    expect(registry.get('p1')?.title).toBe('Paper p1');
    expect(registry.get('missing')).toBeUndefined();
  });

  it('overwrites an existing entry for the same id', () => {
    const registry = new InMemoryPaperRegistry();
    registry.set(createPaper('p1', { title: 'Draft' }));
    registry.set(createPaper('p1', { title: 'Final' }));

    expect(registry.size()).toBe(1);
    expect(registry.get('p1')?.title).toBe('Final');
  });

  it('lists papers in the order they were first added', () => {
    const registry = new InMemoryPaperRegistry();
    registry.set(createPaper('b'));
    registry.set(createPaper('a'));
    registry.set(createPaper('b', { title: 'Updated' }));

    expect(registry.list().map(p => p.paperId)).toEqual(['b', 'a']);
  });

  it('keeps separate instances isolated', () => {
    const first = new InMemoryPaperRegistry();
    const second = new InMemoryPaperRegistry();
    first.set(createPaper('p1'));

    expect(second.size()).toBe(0);
  });
});
