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
 * PostgreSQL vector store implementation with pgvector
 * Provides persistent vector storage and similarity search capabilities
 *
 * @packageDocumentation
 */

import { Pool, PoolClient } from 'pg';
import type { Logger } from 'winston';
import { AppError, describeError, NotInitializedError } from '../errors';
import { IVectorStore } from '../interfaces';
import { EmbeddingRecord, PostgresConfig, SearchFilter, SearchResult } from '../models';

interface ChunkRow {
  id: string;
  paper_id: string;
  title: string;
  authors: string;
  chunk_index: number;
  content: string;
  similarity: string | number;
}

const UPSERT_SQL = `
  INSERT INTO paper_chunks (
    collection, id, paper_id, title, authors, chunk_index, content, embedding
  ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
  ON CONFLICT (collection, id)
  DO UPDATE SET
    paper_id = EXCLUDED.paper_id,
    title = EXCLUDED.title,
    authors = EXCLUDED.authors,
    chunk_index = EXCLUDED.chunk_index,
    content = EXCLUDED.content,
    embedding = EXCLUDED.embedding,
    updated_at = CURRENT_TIMESTAMP
`;

/**
 * PostgreSQL vector store using the pgvector extension
 * Follows Single Responsibility Principle
 *
 * Collections are rows sharing a `collection` value in one `paper_chunks`
 * table, created by migrations/001_create_paper_chunks.sql.
 */
export class PgVectorStore implements IVectorStore {
  private readonly logger: Logger;
  private readonly pool: Pool;
  private initialized = false;

  constructor(logger: Logger, config: PostgresConfig, pool?: Pool) {
    this.logger = logger;

    this.pool =
      pool ??
      new Pool({
        host: config.host,
        port: config.port,
        database: config.database,
        user: config.user,
        password: config.password,
        ssl: config.ssl ? { rejectUnauthorized: false } : false,
        max: config.maxConnections || 10,
        idleTimeoutMillis: config.idleTimeoutMillis || 30000,
        connectionTimeoutMillis: config.connectionTimeoutMillis || 5000,
      });

    this.pool.on('error', err => {
      this.logger.error('Unexpected PostgreSQL pool error', err);
    });
  }

  /**
   * Verify connection, extension and schema. Runs once.
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      this.logger.debug('PgVectorStore already initialized');
      return;
    }

    try {
      this.logger.info('Initializing PgVectorStore...');
      await this.withClient(async client => {
        await client.query('SELECT NOW()');

        const extension = await client.query<{ installed: boolean }>(
          "SELECT EXISTS(SELECT 1 FROM pg_extension WHERE extname = 'vector') AS installed",
        );
        if (!extension.rows[0]?.installed) {
          throw new Error('pgvector extension is not installed. Please run: CREATE EXTENSION vector;');
        }

        const table = await client.query<{ exists: boolean }>(
          "SELECT EXISTS(SELECT 1 FROM information_schema.tables WHERE table_name = 'paper_chunks') AS exists",
        );
        if (!table.rows[0]?.exists) {
          throw new Error('paper_chunks table not found. Run migrations first.');
        }
      });

      this.initialized = true;
      this.logger.info('PgVectorStore initialized successfully');
    } catch (error) {
      this.logger.error('Failed to initialize PgVectorStore', error);
      throw new AppError(`PgVectorStore initialization failed: ${describeError(error)}`, 'VECTOR_STORE_INIT_FAILED', {
        statusCode: 503,
        isOperational: false,
        cause: error,
      });
    }
  }

  async ensureCollection(name: string): Promise<void> {
    await this.initialize();
    this.logger.debug(`Using collection: ${name}`);
  }

  async dropCollection(name: string): Promise<void> {
    await this.initialize();
    const result = await this.withClient(client =>
      client.query('DELETE FROM paper_chunks WHERE collection = $1', [name]),
    );
    this.logger.info(`Dropped collection ${name} (${result.rowCount ?? 0} vectors)`);
  }

  /**
   * Upsert records in one transaction
   */
  async upsert(collection: string, records: EmbeddingRecord[]): Promise<void> {
    this.ensureInitialized();

    if (records.length === 0) {
      return;
    }

    await this.withClient(async client => {
      try {
        await client.query('BEGIN');
        for (const record of records) {
          await client.query(UPSERT_SQL, [
            collection,
            record.id,
            record.metadata.paperId,
            record.metadata.title,
            record.metadata.authors,
            record.metadata.chunkIndex,
            record.content,
            this.vectorToSql(record.vector),
          ]);
        }
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK');
        this.logger.error(`Failed to upsert ${records.length} vectors into ${collection}`, error);
        throw error;
      }
    });

    this.logger.debug(`Upserted ${records.length} vectors into ${collection}`);
  }

  /**
   * Cosine search using pgvector's <=> operator and the HNSW index
   */
  async search(
    collection: string,
    queryVector: number[],
    topK: number,
    filter?: SearchFilter,
  ): Promise<SearchResult[]> {
    this.ensureInitialized();

    const query = `
      SELECT
        id,
        paper_id,
        title,
        authors,
        chunk_index,
        content,
        1 - (embedding <=> $1) AS similarity
      FROM paper_chunks
      WHERE collection = $2 AND ($3::TEXT IS NULL OR paper_id = $3)
      ORDER BY embedding <=> $1
      LIMIT $4
    `;

    const result = await this.withClient(client =>
      client.query<ChunkRow>(query, [this.vectorToSql(queryVector), collection, filter?.paperId || null, topK]),
    );

    this.logger.debug(
      `Found ${result.rows.length} results in ${collection} (paperId: ${filter?.paperId || 'all'})`,
    );

    return result.rows.map(row => ({
      chunk: {
        id: row.id,
        content: row.content,
        metadata: {
          paperId: row.paper_id,
          title: row.title,
          chunkIndex: row.chunk_index,
          authors: row.authors,
        },
      },
      similarity: Number(row.similarity),
    }));
  }

  async count(collection: string): Promise<number> {
    this.ensureInitialized();

    const result = await this.withClient(client =>
      client.query<{ count: string }>('SELECT COUNT(*) AS count FROM paper_chunks WHERE collection = $1', [
        collection,
      ]),
    );
    return parseInt(result.rows[0]?.count ?? '0', 10);
  }

  /**
   * Close the connection pool
   * Should be called on application shutdown
   */
  async close(): Promise<void> {
    await this.pool.end();
    this.logger.info('PgVectorStore connection pool closed');
  }

  private async withClient<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await work(client);
    } finally {
      client.release();
    }
  }

  /**
   * Convert number array to PostgreSQL vector format
   */
  private vectorToSql(vector: number[]): string {
    return `[${vector.join(',')}]`;
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new NotInitializedError('PgVectorStore');
    }
  }
}
