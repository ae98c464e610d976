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
 * arXiv paper source
 * Searches the arXiv Atom API and downloads paper PDFs
 *
 * @packageDocumentation
 */

import fetch, { FetchError, Response } from 'node-fetch';
import { parseStringPromise } from 'xml2js';
import { z } from 'zod';
import type { Logger } from 'winston';
import { AppError, describeError, PayloadTooLargeError, SourceFetchError } from '../errors';
import { FetchOptions, IConfigService, IPaperSource, ServiceDependencies } from '../interfaces';
import { PaperHandle } from '../models';

const AtomEntrySchema = z.object({
  id: z.array(z.string()).nonempty(),
  title: z.array(z.string()).nonempty(),
  published: z.array(z.string()).nonempty(),
  summary: z.array(z.string()).optional(),
  author: z.array(z.object({ name: z.array(z.string()).nonempty() })).optional(),
  category: z.array(z.object({ $: z.object({ term: z.string() }) })).optional(),
});

const AtomFeedSchema = z.object({
  feed: z.object({
    entry: z.array(z.unknown()).optional(),
  }),
});

type AtomEntry = z.infer<typeof AtomEntrySchema>;

/**
 * Retry-After as milliseconds; accepts delta-seconds or an HTTP date
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

/**
 * Map an HTTP failure to a source error. Rate limits and server errors may
 * succeed later; other client errors will not.
 */
export function errorForStatus(response: Response, what: string): SourceFetchError {
  const retryable = response.status === 429 || response.status >= 500;
  return new SourceFetchError(`${what} failed: HTTP ${response.status}`, {
    status: response.status,
    retryable,
    retryAfterMs: retryable ? parseRetryAfter(response.headers.get('retry-after')) : undefined,
  });
}

/**
 * `2301.12345` names every version of a paper; `2301.12345v2` only that one
 */
export function isSamePaper(requestedId: string, paperId: string): boolean {
  if (requestedId === paperId) {
    return true;
  }
  return /^v\d+$/.test(paperId.slice(requestedId.length)) && paperId.startsWith(requestedId);
}

function toHandle(entry: AtomEntry): PaperHandle {
  const url = entry.id[0];
  const paperId = url.split('/').pop() || url;
  return {
    paperId,
    title: entry.title[0],
    authors: (entry.author ?? []).map(author => author.name[0]),
    published: entry.published[0].slice(0, 10),
    url,
    pdfUrl: `https://arxiv.org/pdf/${paperId}.pdf`,
    summary: entry.summary?.[0] ?? '',
    categories: (entry.category ?? []).map(category => category.$.term),
  };
}

/**
 * Service for finding and downloading papers from arXiv
 * Follows Single Responsibility and Dependency Inversion principles
 */
export class ArxivPaperSource implements IPaperSource {
  private readonly logger: Logger;
  private readonly configService: IConfigService;

  constructor(dependencies: ServiceDependencies) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
  }

  async search(query: string, maxResults: number): Promise<PaperHandle[]> {
    this.logger.info(`Searching arXiv for: '${query}' (max ${maxResults})`);

    const papers = await this.queryApi({
      search_query: query,
      start: '0',
      max_results: String(maxResults),
      sortBy: 'relevance',
      sortOrder: 'descending',
    });

    this.logger.info(`Found ${papers.length} papers for '${query}'`);
    return papers;
  }

  async lookup(paperIds: string[]): Promise<PaperHandle[]> {
    if (paperIds.length === 0) {
      return [];
    }

    const papers = await this.queryApi({
      id_list: paperIds.join(','),
      max_results: String(paperIds.length),
    });

    const missing = paperIds.filter(id => !papers.some(paper => isSamePaper(id, paper.paperId)));
    if (missing.length > 0) {
      this.logger.warn(`arXiv returned no entry for: ${missing.join(', ')}`);
    }
    return papers;
  }

  /**
   * Download a paper's PDF. The body is streamed with a running byte count
   * and abandoned as soon as it passes `maxBytes`.
   */
  async fetch(handle: PaperHandle, options: FetchOptions): Promise<Buffer> {
    this.logger.debug(`Downloading ${handle.paperId} from ${handle.pdfUrl}`);

    try {
      const response = await fetch(handle.pdfUrl, { timeout: options.timeoutMs });
      if (!response.ok) {
        throw errorForStatus(response, `Download of ${handle.paperId}`);
      }

      const declared = Number(response.headers.get('content-length'));
      if (Number.isFinite(declared) && declared > options.maxBytes) {
        throw new PayloadTooLargeError(options.maxBytes, declared);
      }

      const parts: Buffer[] = [];
      let received = 0;
      // Leaving the loop early destroys the underlying stream
      for await (const part of response.body) {
        const buffer = typeof part === 'string' ? Buffer.from(part) : part;
        received += buffer.length;
        if (received > options.maxBytes) {
          throw new PayloadTooLargeError(options.maxBytes, received);
        }
        parts.push(buffer);
      }

      this.logger.debug(`Downloaded ${received} bytes for ${handle.paperId}`);
      return Buffer.concat(parts, received);
    } catch (error) {
      throw this.normalizeError(error, `Download of ${handle.paperId}`);
    }
  }

  private async queryApi(params: Record<string, string>): Promise<PaperHandle[]> {
    const { baseUrl } = this.configService.getConfig().source;
    const { fetchMs } = this.configService.getConfig().timeouts;
    const url = `${baseUrl}?${new URLSearchParams(params).toString()}`;

    let xml: string;
    try {
      const response = await fetch(url, { timeout: fetchMs });
      if (!response.ok) {
        throw errorForStatus(response, 'arXiv query');
      }
      xml = await response.text();
    } catch (error) {
      throw this.normalizeError(error, 'arXiv query');
    }

    return this.parseFeed(xml);
  }

  /**
   * Parse an Atom feed into handles. Entries missing required fields are
   * skipped; an API error entry fails the whole query.
   */
  async parseFeed(xml: string): Promise<PaperHandle[]> {
    let parsed: unknown;
    try {
      parsed = await parseStringPromise(xml, { trim: true, normalize: true });
    } catch (error) {
      throw new SourceFetchError(`Malformed arXiv response: ${describeError(error)}`, { retryable: false, cause: error });
    }

    const feed = AtomFeedSchema.safeParse(parsed);
    if (!feed.success) {
      throw new SourceFetchError('Unexpected arXiv response structure', { retryable: false, cause: feed.error });
    }

    const handles: PaperHandle[] = [];
    for (const raw of feed.data.feed.entry ?? []) {
      const entry = AtomEntrySchema.safeParse(raw);
      if (!entry.success) {
        this.logger.debug(`Skipping incomplete arXiv entry: ${entry.error.message}`);
        continue;
      }
      if (entry.data.id[0].includes('/api/errors')) {
        throw new SourceFetchError(`arXiv rejected the query: ${entry.data.summary?.[0] ?? entry.data.title[0]}`, {
          status: 400,
          retryable: false,
        });
      }
      handles.push(toHandle(entry.data));
    }
    return handles;
  }

  private normalizeError(error: unknown, what: string): AppError {
    if (error instanceof AppError) {
      return error;
    }
    // Timeouts and dropped connections
    if (error instanceof FetchError) {
      return new SourceFetchError(`${what} failed: ${error.message}`, { retryable: true, cause: error });
    }
    return new SourceFetchError(`${what} failed: ${describeError(error)}`, { retryable: false, cause: error });
  }
}
