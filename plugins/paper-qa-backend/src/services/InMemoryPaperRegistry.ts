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
 * Process-wide paper metadata, keyed by paper id
 *
 * @packageDocumentation
 */

import { IPaperRegistry } from '../interfaces';
import { PaperMetadata } from '../models';

/**
 * Last writer wins per id. Listing keeps first-insertion order.
 */
export class InMemoryPaperRegistry implements IPaperRegistry {
  private readonly papers: Map<string, PaperMetadata> = new Map();

  set(paper: PaperMetadata): void {
    this.papers.set(paper.paperId, paper);
  }

  get(paperId: string): PaperMetadata | undefined {
    return this.papers.get(paperId);
  }

  has(paperId: string): boolean {
    return this.papers.has(paperId);
  }

  list(): PaperMetadata[] {
    return Array.from(this.papers.values());
  }

  size(): number {
    return this.papers.size;
  }
}
