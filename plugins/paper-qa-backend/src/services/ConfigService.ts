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
 * Configuration service implementation
 * Manages backend configuration with type-safe access
 *
 * @packageDocumentation
 */

import { Config } from '@backstage/config';
import { ConfigurationError } from '../errors';
import { IConfigService } from '../interfaces';
import { isProviderName, PaperQaConfig, ProviderName, PROVIDER_NAMES } from '../models';

const MEGABYTE = 1024 * 1024;

/**
 * Configuration service over a `@backstage/config` reader
 * Follows Single Responsibility Principle
 */
export class ConfigService implements IConfigService {
  private readonly config: Config;
  private readonly cachedConfig: PaperQaConfig;

  constructor(config: Config) {
    this.config = config;
    this.cachedConfig = this.loadConfig();
  }

  /**
   * Load and validate configuration
   */
  private loadConfig(): PaperQaConfig {
    const chunkSize = this.config.getOptionalNumber('paperQa.chunkSize') ?? 1000;
    const chunkOverlap = this.config.getOptionalNumber('paperQa.chunkOverlap') ?? 200;

    if (chunkSize <= 0 || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new ConfigurationError(
        `chunkOverlap (${chunkOverlap}) must be non-negative and smaller than chunkSize (${chunkSize})`,
        { chunkSize, chunkOverlap },
      );
    }

    return {
      maxPapers: this.config.getOptionalNumber('paperQa.maxPapers') ?? 5,
      chunkSize,
      chunkOverlap,
      minChunkChars: this.config.getOptionalNumber('paperQa.minChunkChars') ?? 100,
      downloadDir: this.config.getOptionalString('paperQa.downloadDir') || './papers',
      collectionName: this.config.getOptionalString('paperQa.collectionName') || 'scirag_papers',
      embeddingModel: this.config.getOptionalString('paperQa.embeddingModel') || 'all-minilm',
      ollamaBaseUrl: this.config.getOptionalString('paperQa.ollamaBaseUrl') || 'http://localhost:11434',
      generation: this.loadGenerationConfig(),
      limits: {
        maxPdfBytes: this.config.getOptionalNumber('paperQa.limits.maxPdfBytes') ?? 50 * MEGABYTE,
        maxPages: this.config.getOptionalNumber('paperQa.limits.maxPages') ?? 500,
        strictPageLimit: this.config.getOptionalBoolean('paperQa.limits.strictPageLimit') ?? false,
        ingestConcurrency: this.config.getOptionalNumber('paperQa.limits.ingestConcurrency') ?? 2,
      },
      timeouts: {
        fetchMs: this.config.getOptionalNumber('paperQa.timeouts.fetchMs') ?? 30000,
        extractMs: this.config.getOptionalNumber('paperQa.timeouts.extractMs') ?? 60000,
        storeMs: this.config.getOptionalNumber('paperQa.timeouts.storeMs') ?? 30000,
        generationMs: this.config.getOptionalNumber('paperQa.timeouts.generationMs') ?? 120000,
      },
      source: {
        baseUrl: this.config.getOptionalString('paperQa.source.baseUrl') || 'https://export.arxiv.org/api/query',
        minRequestIntervalMs: this.config.getOptionalNumber('paperQa.source.minRequestIntervalMs') ?? 3000,
        retry: {
          maxAttempts: this.config.getOptionalNumber('paperQa.source.retry.maxAttempts') ?? 3,
          baseDelayMs: this.config.getOptionalNumber('paperQa.source.retry.baseDelayMs') ?? 1000,
          maxDelayMs: this.config.getOptionalNumber('paperQa.source.retry.maxDelayMs') ?? 30000,
        },
      },
      vectorStore: this.loadVectorStoreConfig(),
    };
  }

  private loadGenerationConfig(): PaperQaConfig['generation'] {
    const provider = this.config.getOptionalString('paperQa.generation.provider') || 'claude';
    if (!isProviderName(provider)) {
      throw new ConfigurationError(
        `Unknown generation provider "${provider}". Expected one of: ${PROVIDER_NAMES.join(', ')}`,
      );
    }

    const apiKeys: Partial<Record<ProviderName, string>> = {};
    for (const name of PROVIDER_NAMES) {
      const key = this.config.getOptionalString(`paperQa.generation.apiKeys.${name}`);
      if (key) {
        apiKeys[name] = key;
      }
    }

    return {
      provider,
      model: this.config.getOptionalString('paperQa.generation.model') || undefined,
      maxTokens: this.config.getOptionalNumber('paperQa.generation.maxTokens') ?? 2000,
      apiKeys,
    };
  }

  /**
   * Load vector store configuration
   */
  private loadVectorStoreConfig(): PaperQaConfig['vectorStore'] {
    const type = this.config.getOptionalString('paperQa.vectorStore.type');

    const fallbackToMemory = this.config.getOptionalBoolean('paperQa.vectorStore.fallbackToMemory') ?? true;

    if (type === 'postgresql') {
      return {
        type: 'postgresql',
        fallbackToMemory,
        postgresql: this.loadPostgresConfig(),
      };
    }

    // Default to in-memory store
    return {
      type: 'memory',
      fallbackToMemory,
    };
  }

  /**
   * Load PostgreSQL configuration with validation
   */
  private loadPostgresConfig(): NonNullable<PaperQaConfig['vectorStore']['postgresql']> {
    const host = this.config.getOptionalString('paperQa.vectorStore.postgresql.host') || 'localhost';
    const port = this.config.getOptionalNumber('paperQa.vectorStore.postgresql.port') || 5432;
    const database = this.config.getOptionalString('paperQa.vectorStore.postgresql.database') || 'paper_vectors';
    const user = this.config.getOptionalString('paperQa.vectorStore.postgresql.user') || 'paperqa';
    const password = this.config.getOptionalString('paperQa.vectorStore.postgresql.password') || '';
    const ssl = this.config.getOptionalBoolean('paperQa.vectorStore.postgresql.ssl') ?? false;
    const maxConnections = this.config.getOptionalNumber('paperQa.vectorStore.postgresql.maxConnections') || 10;
    const idleTimeoutMillis = this.config.getOptionalNumber('paperQa.vectorStore.postgresql.idleTimeoutMillis') || 30000;
    const connectionTimeoutMillis =
      this.config.getOptionalNumber('paperQa.vectorStore.postgresql.connectionTimeoutMillis') || 5000;

    if (!password) {
      throw new ConfigurationError('PostgreSQL password is required when using postgresql vector store');
    }

    return {
      host,
      port,
      database,
      user,
      password,
      ssl,
      maxConnections,
      idleTimeoutMillis,
      connectionTimeoutMillis,
    };
  }

  getConfig(): PaperQaConfig {
    return this.cachedConfig;
  }

  /**
   * Get vector store type
   */
  getVectorStoreType(): 'memory' | 'postgresql' {
    return this.cachedConfig.vectorStore.type;
  }

  /**
   * Get PostgreSQL configuration
   * Throws error if not configured
   */
  getPostgresConfig(): NonNullable<PaperQaConfig['vectorStore']['postgresql']> {
    if (this.cachedConfig.vectorStore.type !== 'postgresql' || !this.cachedConfig.vectorStore.postgresql) {
      throw new ConfigurationError('PostgreSQL vector store is not configured');
    }
    return this.cachedConfig.vectorStore.postgresql;
  }
}
