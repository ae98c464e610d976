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

import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import fetch, { FetchError, Response } from 'node-fetch';
import { Readable } from 'stream';
import { PayloadTooLargeError, SourceFetchError } from '../errors';
import { createPaper, createTestConfig, createTestLogger } from '../testing';
import { ArxivPaperSource, isSamePaper, parseRetryAfter } from './ArxivPaperSource';

jest.mock('node-fetch', () => {
  const actual = jest.requireActual<typeof import('node-fetch')>('node-fetch');
  return { __esModule: true, default: jest.fn(), Response: actual.Response, FetchError: actual.FetchError };
});

const mockFetch = jest.mocked(fetch);

const FEED = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title type="html">ArXiv Query</title>
  <entry>
    <id>http://arxiv.org/abs/2401.00001v2</id>
    <published>2024-01-02T18:00:00Z</published>
    <title>Sparse Graph
      Transformers</title>
    <summary>We study sparse attention on graphs.</summary>
    <author><name>Ada Example</name></author>
    <author><name>Ben Sample</name></author>
    <category term="cs.LG" scheme="http://arxiv.org/schemas/atom"/>
    <category term="stat.ML" scheme="http://arxiv.org/schemas/atom"/>
  </entry>
  <entry>
    <id>http://arxiv.org/abs/2402.00002v1</id>
    <published>2024-02-10T09:30:00Z</published>
    <title>Protein Folding at Scale</title>
    <summary>A folding benchmark.</summary>
    <author><name>Cleo Placeholder</name></author>
  </entry>
</feed>`;

const ERROR_FEED = `<feed xmlns="http://www.w3.org/2005/Atom">
  <entry>
    <id>http://arxiv.org/api/errors#incorrect_id_format_for_bogus</id>
    <title>Error</title>
    <published>2024-01-01T00:00:00Z</published>
    <summary>incorrect id format for bogus</summary>
  </entry>
</feed>`;

describe('ArxivPaperSource', () => {
  let source: ArxivPaperSource;

  beforeEach(() => {
    mockFetch.mockReset();
    source = new ArxivPaperSource({ logger: createTestLogger(), config: createTestConfig() });
  });

  describe('search', () => {
    it('queries by relevance and maps entries to handles', async () => {
      mockFetch.mockResolvedValueOnce(new Response(FEED));

      const papers = await source.search('all:graph neural', 2);

      expect(mockFetch.mock.calls[0][0]).toBe(
        'https://export.arxiv.org/api/query?search_query=all%3Agraph+neural&start=0&max_results=2&sortBy=relevance&sortOrder=descending',
      );
      expect(papers).toHaveLength(2);
      expect(papers[0]).toEqual({
        paperId: '2401.00001v2',
        title: 'Sparse Graph Transformers',
        authors: ['Ada Example', 'Ben Sample'],
        published: '2024-01-02',
        url: 'http://arxiv.org/abs/2401.00001v2',
        pdfUrl: 'https://arxiv.org/pdf/2401.00001v2.pdf',
        summary: 'We study sparse attention on graphs.',
        categories: ['cs.LG', 'stat.ML'],
      });
      expect(papers[1].categories).toEqual([]);
    });

    it('returns nothing for an empty feed', async () => {
      mockFetch.mockResolvedValueOnce(new Response('<feed xmlns="http://www.w3.org/2005/Atom"></feed>'));

      await expect(source.search('nothing', 3)).resolves.toEqual([]);
    });

    it('surfaces API error entries as terminal failures', async () => {
      mockFetch.mockResolvedValueOnce(new Response(ERROR_FEED));

      const error = await source.search('bogus', 1).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SourceFetchError);
      expect(error).toMatchObject({
        message: 'arXiv rejected the query: incorrect id format for bogus',
        retryable: false,
      });
    });

    it('marks rate limiting as retryable and honours Retry-After', async () => {
      mockFetch.mockResolvedValueOnce(new Response('slow down', { status: 429, headers: { 'Retry-After': '7' } }));

      const error = await source.search('graphs', 1).catch((e: unknown) => e);

      expect(error).toMatchObject({
        code: 'SOURCE_RATE_LIMITED',
        retryable: true,
        retryAfterMs: 7000,
        message: 'arXiv query failed: HTTP 429',
      });
    });
  });

  describe('lookup', () => {
    it('resolves explicit ids through id_list', async () => {
      mockFetch.mockResolvedValueOnce(new Response(FEED));

      const papers = await source.lookup(['2401.00001v2', '2402.00002v1', '9999.99999v1']);

      expect(String(mockFetch.mock.calls[0][0])).toContain('id_list=2401.00001v2%2C2402.00002v1%2C9999.99999v1');
      expect(papers.map(p => p.paperId)).toEqual(['2401.00001v2', '2402.00002v1']);
    });

    it('does not call the API without ids', async () => {
      await expect(source.lookup([])).resolves.toEqual([]);
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });

  describe('fetch', () => {
    const paper = createPaper('2401.00001v2');

    it('returns the downloaded bytes', async () => {
      mockFetch.mockResolvedValueOnce(new Response(Readable.from([Buffer.from('%PDF-'), Buffer.from('1.4')])));

      const bytes = await source.fetch(paper, { maxBytes: 100, timeoutMs: 5000 });

      expect(bytes.toString()).toBe('%PDF-1.4');
      expect(mockFetch).toHaveBeenCalledWith('https://arxiv.org/pdf/2401.00001v2.pdf', { timeout: 5000 });
    });

    it('rejects an oversized declared length before reading the body', async () => {
      mockFetch.mockResolvedValueOnce(
        new Response(Buffer.alloc(10), { headers: { 'Content-Length': String(3 * 1024 * 1024) } }),
      );

      const error = await source.fetch(paper, { maxBytes: 1024 * 1024, timeoutMs: 5000 }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PayloadTooLargeError);
      expect(error).toMatchObject({ message: 'Document too large: 3.0MB received (max: 1.0MB)' });
    });

    it('stops streaming once the running total passes the cap', async () => {
      const pulled: number[] = [];
      const body = Readable.from(
        (function* () {
          for (let i = 0; i < 10; i++) {
            pulled.push(i);
            yield Buffer.alloc(40);
          }
        })(),
        { highWaterMark: 1 },
      );
      mockFetch.mockResolvedValueOnce(new Response(body));

      await expect(source.fetch(paper, { maxBytes: 100, timeoutMs: 5000 })).rejects.toBeInstanceOf(
        PayloadTooLargeError,
      );
      expect(pulled.length).toBeLessThan(10);
    });

    it('treats timeouts and dropped connections as retryable', async () => {
      mockFetch.mockRejectedValueOnce(new FetchError('network timeout at: https://arxiv.org', 'request-timeout'));

      const error = await source.fetch(paper, { maxBytes: 100, timeoutMs: 5000 }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SourceFetchError);
      expect(error).toMatchObject({ retryable: true });
    });

    it('treats a missing document as terminal', async () => {
      mockFetch.mockResolvedValueOnce(new Response('not found', { status: 404 }));

      const error = await source.fetch(paper, { maxBytes: 100, timeoutMs: 5000 }).catch((e: unknown) => e);

      expect(error).toMatchObject({
        code: 'SOURCE_FETCH_FAILED',
        retryable: false,
        message: 'Download of 2401.00001v2 failed: HTTP 404',
      });
    });
  });
});

describe('parseRetryAfter', () => {
  it('reads delta seconds', () => {
    expect(parseRetryAfter('3')).toBe(3000);
  });

  it('reads an HTTP date relative to now', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:05 GMT', now)).toBe(5000);
  });

  it('ignores missing or unreadable values', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});

describe('isSamePaper', () => {
  it('matches an exact id', () => {
    expect(isSamePaper('2301.12345v1', '2301.12345v1')).toBe(true);
  });

  it('matches an id without a version to any version', () => {
    expect(isSamePaper('2301.12345', '2301.12345v2')).toBe(true);
  });

  it('does not match a different version or a prefix of another id', () => {
    expect(isSamePaper('2301.12345v1', '2301.12345v2')).toBe(false);
    expect(isSamePaper('2301.1234', '2301.12345v2')).toBe(false);
    expect(isSamePaper('2301.12345', '2301.12345v')).toBe(false);
  });
});
