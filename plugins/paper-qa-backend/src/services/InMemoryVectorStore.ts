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
 * In-memory vector store implementation
 * Provides per-collection vector storage and similarity search
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { ContractViolationError } from '../errors';
import { IVectorStore } from '../interfaces';
import { EmbeddingRecord, SearchFilter, SearchResult } from '../models';

/**
 * In-memory vector store using cosine similarity
 * Follows Single Responsibility Principle
 *
 * Note: contents are lost on restart; use PgVectorStore for persistence
 */
export class InMemoryVectorStore implements IVectorStore {
  private readonly logger: Logger;
  private readonly collections: Map<string, Map<string, EmbeddingRecord>> = new Map();

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async ensureCollection(name: string): Promise<void> {
    if (!this.collections.has(name)) {
      this.collections.set(name, new Map());
      this.logger.info(`Created collection: ${name}`);
    }
  }

  async dropCollection(name: string): Promise<void> {
    const existing = this.collections.get(name);
    this.collections.delete(name);
    this.logger.info(`Dropped collection ${name} (${existing?.size ?? 0} vectors)`);
  }

  async upsert(collection: string, records: EmbeddingRecord[]): Promise<void> {
    const vectors = this.getCollection(collection);
    for (const record of records) {
      vectors.set(record.id, record);
    }
    this.logger.debug(`Upserted ${records.length} vectors into ${collection}`);
  }

  async search(
    collection: string,
    queryVector: number[],
    topK: number,
    filter?: SearchFilter,
  ): Promise<SearchResult[]> {
    const candidates = Array.from(this.getCollection(collection).values()).filter(
      record => !filter?.paperId || record.metadata.paperId === filter.paperId,
    );

    const results: SearchResult[] = candidates.map(record => ({
      chunk: { id: record.id, content: record.content, metadata: record.metadata },
      similarity: this.cosineSimilarity(queryVector, record.vector),
    }));

    // Sort by similarity (descending) and return top K
    results.sort((a, b) => b.similarity - a.similarity);
    const topResults = results.slice(0, topK);

    this.logger.debug(
      `Found ${topResults.length} results in ${collection} (paperId: ${filter?.paperId || 'all'})`,
    );

    return topResults;
  }

  async count(collection: string): Promise<number> {
    return this.getCollection(collection).size;
  }

  private getCollection(name: string): Map<string, EmbeddingRecord> {
    const vectors = this.collections.get(name);
    if (!vectors) {
      throw new ContractViolationError(`Collection ${name} does not exist`, { collection: name });
    }
    return vectors;
  }

  /**
   * Calculate cosine similarity between two vectors
   */
  private cosineSimilarity(a: number[], b: number[]): number {
    if (a.length !== b.length) {
      throw new ContractViolationError(`Vectors must have the same length (${a.length} != ${b.length})`);
    }

    let dotProduct = 0;
    let normA = 0;
    let normB = 0;

    for (let i = 0; i < a.length; i++) {
      dotProduct += a[i] * b[i];
      normA += a[i] * a[i];
      normB += b[i] * b[i];
    }

    const denominator = Math.sqrt(normA) * Math.sqrt(normB);

    if (denominator === 0) {
      return 0;
    }

    return dotProduct / denominator;
  }
}
