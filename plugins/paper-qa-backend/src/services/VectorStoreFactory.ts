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
 * Factory for creating vector store implementations
 * Implements Factory Pattern for vector store selection
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { describeError } from '../errors';
import { IVectorStore } from '../interfaces';
import { ConfigService } from './ConfigService';
import { InMemoryVectorStore } from './InMemoryVectorStore';
import { PgVectorStore } from './PgVectorStore';

/**
 * Factory class for creating vector store instances
 * Follows Factory Pattern and Open/Closed Principle
 *
 * Usage:
 * ```typescript
 * const vectorStore = await VectorStoreFactory.create(configService, logger);
 * ```
 */
export class VectorStoreFactory {
  /**
   * Create a vector store based on configuration, falling back to memory
   * when PostgreSQL cannot be reached unless `fallbackToMemory` is off
   */
  static async create(config: ConfigService, logger: Logger): Promise<IVectorStore> {
    if (!config.getConfig().vectorStore.fallbackToMemory) {
      return VectorStoreFactory.createStrict(config, logger);
    }

    const vectorStoreType = config.getVectorStoreType();

    logger.info(`Creating vector store: ${vectorStoreType}`);

    if (vectorStoreType === 'postgresql') {
      const store = new PgVectorStore(logger, config.getPostgresConfig());
      try {
        await store.initialize();
        return store;
      } catch (error) {
        logger.error(`Failed to initialize PostgreSQL vector store: ${describeError(error)}`);
        logger.warn('Falling back to in-memory vector store');
        await store.close();
        return new InMemoryVectorStore(logger);
      }
    }

    logger.info('Using in-memory vector store');
    return new InMemoryVectorStore(logger);
  }

  /**
   * Create vector store with strict mode (no fallback)
   *
   * @throws AppError if the PostgreSQL store cannot be initialized
   */
  static async createStrict(config: ConfigService, logger: Logger): Promise<IVectorStore> {
    const vectorStoreType = config.getVectorStoreType();

    logger.info(`Creating vector store (strict mode): ${vectorStoreType}`);

    if (vectorStoreType === 'postgresql') {
      const store = new PgVectorStore(logger, config.getPostgresConfig());
      await store.initialize();
      return store;
    }

    return new InMemoryVectorStore(logger);
  }
}
