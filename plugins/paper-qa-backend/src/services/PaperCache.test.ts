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

import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createPaper, createTestLogger } from '../testing';
import { idDigest, PaperCache, sanitizeTitle } from './PaperCache';

describe('sanitizeTitle', () => {
  it('keeps letters, digits, spaces, dashes and underscores', () => {
    expect(sanitizeTitle('BERT: Pre-training of Deep_Bidirectional Transformers!')).toBe(
      'BERT Pre-training of Deep_Bidirectional Transformers',
    );
  });

  it('strips path separators and dots', () => {
    expect(sanitizeTitle('../../etc/passwd')).toBe('etcpasswd');
  });

  it('falls back to a fixed name when nothing survives', () => {
    expect(sanitizeTitle('../..')).toBe('paper');
  });

  it('truncates long titles to 100 characters', () => {
    expect(sanitizeTitle('a'.repeat(150))).toHaveLength(100);
  });
});

describe('PaperCache', () => {
  let root: string;
  let cache: PaperCache;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'paper-cache-'));
    cache = new PaperCache(root, createTestLogger());
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('names files after the title and a digest of the id', () => {
    const filePath = cache.pathFor(createPaper('2301.00001v1', { title: 'Graph Nets' }));

    expect(filePath).toBe(path.join(root, `Graph Nets-${idDigest('2301.00001v1')}.pdf`));
    expect(idDigest('2301.00001v1')).toMatch(/^[0-9a-f]{8}$/);
  });

  it('gives papers with colliding titles different files', () => {
    const first = cache.pathFor(createPaper('p1', { title: 'Survey' }));
    const second = cache.pathFor(createPaper('p2', { title: 'Survey' }));

    expect(first).not.toBe(second);
  });

  it('keeps traversal attempts inside the root', () => {
    const filePath = cache.pathFor(createPaper('p1', { title: '../../outside' }));

    expect(path.dirname(filePath)).toBe(root);
  });

  it('reads back what it wrote', async () => {
    const paper = createPaper('p1');
    const written = await cache.write(paper, Buffer.from('%PDF-1.4 test'));

    expect(written).toBe(cache.pathFor(paper));
    expect((await cache.read(paper))?.toString()).toBe('%PDF-1.4 test');
  });

  it('returns null on a miss', async () => {
    await expect(cache.read(createPaper('absent'))).resolves.toBeNull();
  });

  it('rethrows read errors other than a missing file', async () => {
    const paper = createPaper('blocked');
    await fs.mkdir(cache.pathFor(paper), { recursive: true });

    await expect(cache.read(paper)).rejects.toMatchObject({ code: 'EISDIR' });
  });
});
