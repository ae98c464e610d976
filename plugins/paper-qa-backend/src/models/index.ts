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
 * Domain models and data structures
 *
 * @packageDocumentation
 */

/**
 * Names of the answer-generation backends the factory can build
 */
export const PROVIDER_NAMES = ['claude', 'openai', 'deepseek', 'gemini', 'ollama'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export function isProviderName(value: string): value is ProviderName {
  return (PROVIDER_NAMES as readonly string[]).includes(value);
}

/**
 * Metadata describing one paper, as returned by the paper source.
 * Immutable once created.
 */
export interface PaperMetadata {
  paperId: string;
  title: string;
  authors: string[];
  /** Publication date, `YYYY-MM-DD` */
  published: string;
  url: string;
  pdfUrl: string;
  summary: string;
  categories: string[];
}

/**
 * A paper the source can download. Carries everything the registry needs.
 */
export type PaperHandle = PaperMetadata;

/**
 * Metadata attached to every indexed chunk
 */
export interface ChunkMetadata {
  paperId: string;
  title: string;
  chunkIndex: number;
  /** First three authors joined for display */
  authors: string;
}

/**
 * A contiguous slice of a paper's extracted text
 */
export interface PaperChunk {
  id: string;
  paperId: string;
  chunkIndex: number;
  content: string;
  metadata: ChunkMetadata;
}

/**
 * A chunk handed back by similarity search
 */
export interface RetrievedChunk {
  id: string;
  content: string;
  metadata: ChunkMetadata;
}

/**
 * Represents an embedding vector with its associated chunk
 */
export interface EmbeddingRecord {
  id: string;
  vector: number[];
  content: string;
  metadata: ChunkMetadata;
}

/**
 * Represents a similarity search result
 */
export interface SearchResult {
  chunk: RetrievedChunk;
  similarity: number;
}

/**
 * Optional restriction applied to a similarity search
 */
export interface SearchFilter {
  paperId?: string;
}

/**
 * Collection statistics reported by the document store
 */
export interface CollectionStats {
  count: number;
  collectionName: string;
}

/**
 * Text produced by the extractor for one document
 */
export interface ExtractionResult {
  text: string;
  pageCount: number;
  /** True when pages beyond the cap were skipped */
  truncated: boolean;
}

export type IngestionStage = 'fetch' | 'extract' | 'chunk' | 'index';

/**
 * Outcome of ingesting one paper
 */
export interface IngestionResult {
  paperId: string;
  status: 'success' | 'failure';
  chunkCount: number;
  failedStage?: IngestionStage;
  error?: string;
  /** Whether retrying the same paper later may succeed */
  retryable?: boolean;
}

/**
 * Aggregated outcome of a batch; `results` keeps input order
 */
export interface BatchResult {
  total: number;
  successful: number;
  failed: number;
  results: IngestionResult[];
}

export type ViolationKind = 'harmful' | 'off_topic' | 'jailbreak' | 'hallucination' | 'not_grounded';

export interface GuardrailVerdict {
  isSafe: boolean;
  kind: ViolationKind | null;
  message: string | null;
}

export interface GuardrailWarning {
  type: ViolationKind;
  message: string;
}

/**
 * Citation entry built from the paper registry
 */
export interface SourceInfo {
  paperId: string;
  title: string;
  authors: string[];
  published: string;
  url: string;
}

export type QueryOutcome = 'answered' | 'blocked' | 'nothing_indexed' | 'no_results' | 'generation_error';

/**
 * Structured result of the question-answering protocol
 */
export interface QueryAnswer {
  success: boolean;
  outcome: QueryOutcome;
  answer: string;
  sources: SourceInfo[];
  warning: GuardrailWarning | null;
  message: string | null;
  provider?: ProviderName;
  model?: string;
  errorId?: string;
}

export { OllamaChatResponseSchema, OllamaEmbedResponseSchema } from './ollama';
export type { OllamaChatResponse, OllamaEmbedResponse } from './ollama';

/**
 * PostgreSQL connection configuration
 */
export interface PostgresConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
  maxConnections?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

/**
 * Vector store configuration
 */
export interface VectorStoreConfig {
  type: 'memory' | 'postgresql';
  /** Use the in-memory store when PostgreSQL cannot be initialized */
  fallbackToMemory: boolean;
  postgresql?: PostgresConfig;
}

export interface RetrySettings {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface GenerationConfig {
  provider: ProviderName;
  model?: string;
  maxTokens: number;
  apiKeys: Partial<Record<ProviderName, string>>;
}

/**
 * Configuration for the paper QA backend
 */
export interface PaperQaConfig {
  maxPapers: number;
  chunkSize: number;
  chunkOverlap: number;
  minChunkChars: number;
  downloadDir: string;
  collectionName: string;
  embeddingModel: string;
  ollamaBaseUrl: string;
  generation: GenerationConfig;
  limits: {
    maxPdfBytes: number;
    maxPages: number;
    strictPageLimit: boolean;
    ingestConcurrency: number;
  };
  timeouts: {
    fetchMs: number;
    extractMs: number;
    storeMs: number;
    generationMs: number;
  };
  source: {
    baseUrl: string;
    minRequestIntervalMs: number;
    retry: RetrySettings;
  };
  vectorStore: VectorStoreConfig;
}
