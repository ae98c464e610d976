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
 * Shared fixtures for unit tests
 *
 * @packageDocumentation
 */

import { AppConfig, ConfigReader } from '@backstage/config';
import { createLogger, Logger } from 'winston';
import { ConfigService } from '../services/ConfigService';
import { PaperMetadata } from '../models';

export function createTestLogger(): Logger {
  return createLogger({ silent: true });
}

/**
 * Config service over the given `paperQa` overrides, defaults elsewhere
 */
export function createTestConfig(overrides: AppConfig['data'] = {}): ConfigService {
  return new ConfigService(new ConfigReader({ paperQa: overrides }));
}

export function createPaper(paperId: string, overrides: Partial<PaperMetadata> = {}): PaperMetadata {
  return {
    paperId,
    title: `Paper ${paperId}`,
    authors: ['Ada Example', 'Ben Sample'],
    published: '2024-01-15',
    url: `http://arxiv.org/abs/${paperId}`,
    pdfUrl: `https://arxiv.org/pdf/${paperId}.pdf`,
    summary: 'A study of test fixtures.',
    categories: ['cs.CL'],
    ...overrides,
  };
}

/**
 * `count` distinct words, `word0 word1 ...`
 */
export function numberedWords(count: number, prefix = 'word'): string {
  return Array.from({ length: count }, (_, i) => `${prefix}${i}`).join(' ');
}
