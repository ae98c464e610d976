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
 * Document processor for chunking extracted paper text
 * Handles document preparation for embedding
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { ConfigurationError } from '../errors';
import { IConfigService } from '../interfaces';
import { ChunkMetadata, PaperChunk, PaperMetadata } from '../models';

export const DEFAULT_MIN_CHUNK_CHARS = 100;

/**
 * Word window a chunk was cut from; `end` is exclusive
 */
export interface ChunkWindow {
  start: number;
  end: number;
  text: string;
}

function assertChunkSettings(chunkSize: number, overlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
    throw new ConfigurationError(`overlap must be an integer in [0, ${chunkSize}), got ${overlap}`, {
      chunkSize,
      overlap,
    });
  }
}

/**
 * Slide a `chunkSize`-word window over the text, advancing by
 * `chunkSize - overlap` words, and keep the windows whose trimmed text has at
 * least `minChars` characters.
 */
export function chunkWindows(
  text: string,
  chunkSize: number,
  overlap: number,
  minChars: number = DEFAULT_MIN_CHUNK_CHARS,
): ChunkWindow[] {
  assertChunkSettings(chunkSize, overlap);

  const words = text.split(/\s+/).filter(Boolean);
  const step = chunkSize - overlap;
  const windows: ChunkWindow[] = [];

  for (let start = 0; start < words.length; start += step) {
    const end = Math.min(start + chunkSize, words.length);
    const chunk = words.slice(start, end).join(' ');
    if (chunk.trim().length >= minChars) {
      windows.push({ start, end, text: chunk });
    }
  }

  return windows;
}

export function chunkText(
  text: string,
  chunkSize: number,
  overlap: number,
  minChars: number = DEFAULT_MIN_CHUNK_CHARS,
): string[] {
  return chunkWindows(text, chunkSize, overlap, minChars).map(window => window.text);
}

/**
 * Deterministic chunk identity; re-ingesting a paper yields the same ids
 */
export function chunkId(paperId: string, chunkIndex: number): string {
  return `${paperId}_chunk_${chunkIndex}`;
}

export function displayAuthors(authors: string[]): string {
  return authors.slice(0, 3).join(', ');
}

/**
 * Service for processing documents into chunks
 * Follows Single Responsibility Principle
 */
export class DocumentProcessor {
  private readonly logger: Logger;
  private readonly configService: IConfigService;

  constructor(logger: Logger, configService: IConfigService) {
    this.logger = logger;
    this.configService = configService;
  }

  /**
   * Chunk a paper's text using the configured window
   */
  chunkDocument(content: string, paper: PaperMetadata): PaperChunk[] {
    const { chunkSize, chunkOverlap, minChunkChars } = this.configService.getConfig();
    const cleanContent = this.extractText(content);

    if (!cleanContent) {
      this.logger.warn(`No content to chunk for paper: ${paper.paperId}`);
      return [];
    }

    const chunks = chunkText(cleanContent, chunkSize, chunkOverlap, minChunkChars).map(
      (text, chunkIndex): PaperChunk => {
        const metadata: ChunkMetadata = {
          paperId: paper.paperId,
          title: paper.title,
          chunkIndex,
          authors: displayAuthors(paper.authors),
        };
        return {
          id: chunkId(paper.paperId, chunkIndex),
          paperId: paper.paperId,
          chunkIndex,
          content: text,
          metadata,
        };
      },
    );

    this.logger.info(`Created ${chunks.length} chunks for ${paper.paperId}`);
    return chunks;
  }

  /**
   * Clean extracted PDF text before chunking
   * Drops control characters, page markers and joins hyphenated line breaks
   */
  extractText(content: string): string {
    let text = content;

    // Remove page separators
    text = text.replace(/^-{3} Page \d+ -{3}$/gm, ' ');

    // Join words hyphenated across a line break
    text = text.replace(/(\w)-\n(\w)/g, '$1$2');

    // Remove control characters other than whitespace
    text = text.replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g, ' ');

    // Normalize whitespace
    text = text.replace(/\s+/g, ' ');

    return text.trim();
  }
}
