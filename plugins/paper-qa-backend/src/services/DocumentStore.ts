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
 * Document store adapter: the text-in, text-out view of the vector backend
 * that ingestion and query work against
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { ContractViolationError, NotInitializedError } from '../errors';
import { IConfigService, IDocumentStore, IEmbeddingService, IVectorStore, ServiceDependencies } from '../interfaces';
import { ChunkMetadata, CollectionStats, EmbeddingRecord, RetrievedChunk, SearchFilter } from '../models';
import { withTimeout } from '../utils/timeout';

export interface DocumentStoreDependencies extends ServiceDependencies {
  vectorStore: IVectorStore;
  embeddings: IEmbeddingService;
}

/**
 * Embeds text on the way in and on query, so callers never handle vectors
 */
export class DocumentStore implements IDocumentStore {
  private readonly logger: Logger;
  private readonly configService: IConfigService;
  private readonly vectorStore: IVectorStore;
  private readonly embeddings: IEmbeddingService;
  private collectionName: string | null = null;

  constructor(dependencies: DocumentStoreDependencies) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
    this.vectorStore = dependencies.vectorStore;
    this.embeddings = dependencies.embeddings;
  }

  async ensureCollection(name: string, reset = false): Promise<void> {
    if (reset) {
      this.logger.warn(`Resetting collection ${name}`);
      await this.bounded(this.vectorStore.dropCollection(name), 'drop collection');
    }
    await this.bounded(this.vectorStore.ensureCollection(name), 'ensure collection');
    this.collectionName = name;
    this.logger.info(`Collection ready: ${name}`);
  }

  async add(texts: string[], metadatas: ChunkMetadata[], ids: string[]): Promise<void> {
    const collection = this.requireCollection();

    if (texts.length !== metadatas.length || texts.length !== ids.length) {
      throw new ContractViolationError(
        `add() needs equal lengths, got ${texts.length} texts, ${metadatas.length} metadatas, ${ids.length} ids`,
      );
    }
    if (texts.length === 0) {
      return;
    }

    const vectors = await this.bounded(this.embeddings.embed(texts), 'embed chunks');
    const records: EmbeddingRecord[] = texts.map((content, i) => ({
      id: ids[i],
      vector: vectors[i],
      content,
      metadata: metadatas[i],
    }));

    await this.bounded(this.vectorStore.upsert(collection, records), 'store chunks');
    this.logger.info(`Added ${records.length} chunks to ${collection}`);
  }

  async query(queryText: string, nResults: number, filter?: SearchFilter): Promise<RetrievedChunk[]> {
    const collection = this.requireCollection();

    const [vector] = await this.bounded(this.embeddings.embed([queryText]), 'embed query');
    const results = await this.bounded(
      this.vectorStore.search(collection, vector, nResults, filter),
      'search chunks',
    );
    return results.map(result => result.chunk);
  }

  async stats(): Promise<CollectionStats> {
    const collectionName = this.requireCollection();
    return {
      count: await this.bounded(this.vectorStore.count(collectionName), 'count chunks'),
      collectionName,
    };
  }

  private requireCollection(): string {
    if (this.collectionName === null) {
      throw new NotInitializedError('Collection');
    }
    return this.collectionName;
  }

  private bounded<T>(operation: Promise<T>, label: string): Promise<T> {
    return withTimeout(operation, this.configService.getConfig().timeouts.storeMs, label);
  }
}
