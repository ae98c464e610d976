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
 * Service interfaces following SOLID principles
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import {
  BatchResult,
  ChunkMetadata,
  CollectionStats,
  EmbeddingRecord,
  ExtractionResult,
  GuardrailVerdict,
  IngestionResult,
  PaperHandle,
  PaperMetadata,
  PaperQaConfig,
  ProviderName,
  RetrievedChunk,
  SearchFilter,
  SearchResult,
} from '../models';

/**
 * Interface for embedding generation
 * Single Responsibility: Turns text into vectors
 */
export interface IEmbeddingService {
  embed(inputs: string[]): Promise<number[][]>;
}

/**
 * Interface for vector store operations
 * Single Responsibility: Manages vector storage and retrieval per collection
 */
export interface IVectorStore {
  /**
   * Open or create a collection. Idempotent.
   */
  ensureCollection(name: string): Promise<void>;

  /**
   * Remove a collection and every record in it
   */
  dropCollection(name: string): Promise<void>;

  /**
   * Insert records, overwriting any with the same id
   */
  upsert(collection: string, records: EmbeddingRecord[]): Promise<void>;

  /**
   * Search for similar vectors, most similar first
   */
  search(collection: string, queryVector: number[], topK: number, filter?: SearchFilter): Promise<SearchResult[]>;

  /**
   * Get total count of stored vectors in a collection
   */
  count(collection: string): Promise<number>;

  /**
   * Release connections held by the backend, if any
   */
  close?(): Promise<void>;
}

/**
 * Interface for the document store adapter consumed by ingestion and query
 */
export interface IDocumentStore {
  ensureCollection(name: string, reset?: boolean): Promise<void>;

  add(texts: string[], metadatas: ChunkMetadata[], ids: string[]): Promise<void>;

  query(queryText: string, nResults: number, filter?: SearchFilter): Promise<RetrievedChunk[]>;

  stats(): Promise<CollectionStats>;
}

export interface FetchOptions {
  maxBytes: number;
  timeoutMs: number;
}

/**
 * Interface for the external paper source
 */
export interface IPaperSource {
  search(query: string, maxResults: number): Promise<PaperHandle[]>;

  /**
   * Resolve explicit paper ids to handles; unknown ids are omitted
   */
  lookup(paperIds: string[]): Promise<PaperHandle[]>;

  /**
   * Download the raw bytes for a paper, aborting once `maxBytes` is exceeded
   */
  fetch(handle: PaperHandle, options: FetchOptions): Promise<Buffer>;
}

/**
 * Interface for raw text extraction
 */
export interface ITextExtractor {
  extract(content: Buffer, maxPages: number): Promise<ExtractionResult>;
}

/**
 * Cache of downloaded document bytes
 */
export interface IPaperCache {
  pathFor(handle: PaperHandle): string;
  read(handle: PaperHandle): Promise<Buffer | null>;
  write(handle: PaperHandle, content: Buffer): Promise<string>;
}

/**
 * Answer-generation backend
 */
export interface IGenerationProvider {
  readonly name: ProviderName;
  readonly model: string;

  defaultModel(): string;

  generate(prompt: string, maxTokens: number): Promise<string>;
}

/**
 * Rule-based screening of questions and answers
 */
export interface IGuardrailService {
  checkInput(text: string): GuardrailVerdict;

  checkOutput(response: string, retrievedContext: string[], question: string): GuardrailVerdict;
}

/**
 * Process-wide paper metadata keyed by paper id
 */
export interface IPaperRegistry {
  set(paper: PaperMetadata): void;
  get(paperId: string): PaperMetadata | undefined;
  has(paperId: string): boolean;
  list(): PaperMetadata[];
  size(): number;
}

export interface IIngestionPipeline {
  processDocument(handle: PaperHandle): Promise<IngestionResult>;
  processBatch(handles: PaperHandle[]): Promise<BatchResult>;
}

/**
 * Interface for configuration management
 * Single Responsibility: Manages backend configuration
 */
export interface IConfigService {
  getConfig(): PaperQaConfig;
}

/**
 * Dependencies for service construction
 */
export interface ServiceDependencies {
  logger: Logger;
  config: IConfigService;
}

export interface IngestionDependencies extends ServiceDependencies {
  source: IPaperSource;
  extractor: ITextExtractor;
  documentStore: IDocumentStore;
  registry: IPaperRegistry;
  cache?: IPaperCache;
}

export interface QueryDependencies extends ServiceDependencies {
  documentStore: IDocumentStore;
  guardrails: IGuardrailService;
  registry: IPaperRegistry;
  /** Used when a question does not bring its own provider */
  provider?: IGenerationProvider;
}
