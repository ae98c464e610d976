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
import { ConfigurationError } from '../errors';
import { createTestConfig } from '../testing';

describe('ConfigService', () => {
  it('fills defaults', () => {
    const config = createTestConfig().getConfig();

    expect(config).toMatchObject({
      maxPapers: 5,
      chunkSize: 1000,
      chunkOverlap: 200,
      minChunkChars: 100,
      collectionName: 'scirag_papers',
      embeddingModel: 'all-minilm',
      generation: { provider: 'claude', maxTokens: 2000, apiKeys: {} },
      limits: { maxPdfBytes: 50 * 1024 * 1024, maxPages: 500, strictPageLimit: false, ingestConcurrency: 2 },
      timeouts: { fetchMs: 30000, extractMs: 60000, storeMs: 30000, generationMs: 120000 },
      source: { minRequestIntervalMs: 3000, retry: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 30000 } },
      vectorStore: { type: 'memory', fallbackToMemory: true },
    });
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => createTestConfig({ chunkSize: 200, chunkOverlap: 200 })).toThrow(ConfigurationError);
  });

  it('rejects an unknown provider', () => {
    expect(() => createTestConfig({ generation: { provider: 'mistral' } })).toThrow(
      'Unknown generation provider "mistral". Expected one of: claude, openai, deepseek, gemini, ollama',
    );
  });

  it('requires a password for the PostgreSQL store', () => {
    expect(() => createTestConfig({ vectorStore: { type: 'postgresql' } })).toThrow(
      'PostgreSQL password is required when using postgresql vector store',
    );
  });

  it('reads the PostgreSQL settings', () => {
    const service = createTestConfig({ vectorStore: { type: 'postgresql', postgresql: { password: 'test-secret' } } });

    expect(service.getVectorStoreType()).toBe('postgresql');
    expect(service.getPostgresConfig()).toMatchObject({ host: 'localhost', port: 5432, password: 'test-secret' });
  });

  it('can turn off the in-memory fallback', () => {
    const service = createTestConfig({
      vectorStore: { type: 'postgresql', fallbackToMemory: false, postgresql: { password: 'test-secret' } },
    });

    expect(service.getConfig().vectorStore.fallbackToMemory).toBe(false);
  });
});
