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
 * PDF text extraction
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { describeError, ExtractionError, PageLimitExceededError } from '../errors';
import { IConfigService, ITextExtractor, ServiceDependencies } from '../interfaces';
import { ExtractionResult } from '../models';

/**
 * Extracts plain text from PDF bytes with `pdf-parse`, reading at most
 * `maxPages` pages
 */
export class PdfTextExtractor implements ITextExtractor {
  private readonly logger: Logger;
  private readonly configService: IConfigService;

  constructor(dependencies: ServiceDependencies) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
  }

  async extract(content: Buffer, maxPages: number): Promise<ExtractionResult> {
    if (content.length === 0) {
      throw new ExtractionError('Document is empty');
    }

    const { default: pdf } = await import('pdf-parse');

    let parsed: Awaited<ReturnType<typeof pdf>>;
    try {
      parsed = await pdf(content, { max: maxPages });
    } catch (error) {
      throw new ExtractionError(`Could not read PDF: ${describeError(error)}`, error);
    }

    const truncated = parsed.numpages > maxPages;
    if (truncated) {
      if (this.configService.getConfig().limits.strictPageLimit) {
        throw new PageLimitExceededError(maxPages, parsed.numpages);
      }
      this.logger.warn(`Document has ${parsed.numpages} pages. Processing first ${maxPages}.`);
    }

    const text = parsed.text.trim() ? parsed.text : '';
    if (!text) {
      this.logger.warn('No text extracted from PDF');
    } else {
      this.logger.debug(`Extracted ${text.length} characters from ${Math.min(parsed.numpages, maxPages)} pages`);
    }

    return { text, pageCount: parsed.numpages, truncated };
  }
}
