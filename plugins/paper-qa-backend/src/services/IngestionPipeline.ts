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
 * Ingestion pipeline: fetch → extract → chunk → index for each paper,
 * with per-document failure isolation across a batch.
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { AppError, ContractViolationError, describeError, PayloadTooLargeError } from '../errors';
import {
  IConfigService,
  IDocumentStore,
  IIngestionPipeline,
  IngestionDependencies,
  IPaperCache,
  IPaperRegistry,
  IPaperSource,
  ITextExtractor,
} from '../interfaces';
import { BatchResult, IngestionResult, IngestionStage, PaperHandle } from '../models';
import { mapWithConcurrency } from '../utils/concurrency';
import { sanitizeErrorMessage } from '../utils/errorResponse';
import { RateGate } from '../utils/RateGate';
import { isRetryableError, RetryPolicy } from '../utils/RetryPolicy';
import { withTimeout } from '../utils/timeout';
import { DocumentProcessor } from './DocumentProcessor';

export interface IngestionPipelineOptions {
  /** Shared across every fetch from the source */
  rateGate?: RateGate;
  retryPolicy?: RetryPolicy;
}

/**
 * Thrown inside the pipeline for outcomes that end a document without an
 * underlying error (nothing extracted, nothing chunked)
 */
class StageFailure extends Error {}

export class IngestionPipeline implements IIngestionPipeline {
  private readonly logger: Logger;
  private readonly configService: IConfigService;
  private readonly source: IPaperSource;
  private readonly extractor: ITextExtractor;
  private readonly documentStore: IDocumentStore;
  private readonly registry: IPaperRegistry;
  private readonly cache?: IPaperCache;
  private readonly processor: DocumentProcessor;
  private readonly rateGate: RateGate;
  private readonly retryPolicy: RetryPolicy;

  constructor(dependencies: IngestionDependencies, options: IngestionPipelineOptions = {}) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
    this.source = dependencies.source;
    this.extractor = dependencies.extractor;
    this.documentStore = dependencies.documentStore;
    this.registry = dependencies.registry;
    this.cache = dependencies.cache;
    this.processor = new DocumentProcessor(this.logger, this.configService);

    const { source } = this.configService.getConfig();
    this.rateGate = options.rateGate ?? new RateGate(source.minRequestIntervalMs);
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy(source.retry, this.logger);
  }

  async processDocument(handle: PaperHandle): Promise<IngestionResult> {
    const { limits, timeouts } = this.configService.getConfig();
    let stage: IngestionStage = 'fetch';

    this.logger.info(`[Ingestion] Processing ${handle.paperId}: ${handle.title}`);

    try {
      const content = await this.fetchContent(handle);

      stage = 'extract';
      const extraction = await withTimeout(
        this.extractor.extract(content, limits.maxPages),
        timeouts.extractMs,
        `Extraction of ${handle.paperId}`,
      );
      if (!extraction.text.trim()) {
        throw new StageFailure('No text could be extracted from the document');
      }

      stage = 'chunk';
      const chunks = this.processor.chunkDocument(extraction.text, handle);
      if (chunks.length === 0) {
        throw new StageFailure('No chunks with enough content were produced');
      }

      stage = 'index';
      await this.documentStore.add(
        chunks.map(chunk => chunk.content),
        chunks.map(chunk => chunk.metadata),
        chunks.map(chunk => chunk.id),
      );
      this.registry.set(handle);

      this.logger.info(`[Ingestion] Indexed ${handle.paperId} (${chunks.length} chunks)`);
      return { paperId: handle.paperId, status: 'success', chunkCount: chunks.length };
    } catch (error) {
      // Programming errors abort the caller, never a single document
      if (error instanceof ContractViolationError) {
        throw error;
      }
      return this.failure(handle, stage, error);
    }
  }

  async processBatch(handles: PaperHandle[]): Promise<BatchResult> {
    const { ingestConcurrency } = this.configService.getConfig().limits;
    this.logger.info(`[Ingestion] Processing batch of ${handles.length} papers (concurrency ${ingestConcurrency})`);

    const results = await mapWithConcurrency(handles, Math.max(1, ingestConcurrency), handle =>
      this.processDocument(handle),
    );

    const successful = results.filter(result => result.status === 'success').length;
    this.logger.info(`[Ingestion] Batch done: ${successful}/${results.length} succeeded`);

    return {
      total: results.length,
      successful,
      failed: results.length - successful,
      results,
    };
  }

  /**
   * Cached bytes when present, otherwise a gated, retried download. Both
   * are held to `maxPdfBytes`.
   */
  private async fetchContent(handle: PaperHandle): Promise<Buffer> {
    const { limits, timeouts } = this.configService.getConfig();

    const cached = await this.cache?.read(handle);
    if (cached) {
      if (cached.length > limits.maxPdfBytes) {
        throw new PayloadTooLargeError(limits.maxPdfBytes, cached.length);
      }
      return cached;
    }

    const content = await this.retryPolicy.execute(async () => {
      await this.rateGate.acquire();
      return this.source.fetch(handle, { maxBytes: limits.maxPdfBytes, timeoutMs: timeouts.fetchMs });
    }, `Fetch of ${handle.paperId}`);

    if (this.cache) {
      try {
        await this.cache.write(handle, content);
      } catch (error) {
        this.logger.warn(`Could not cache ${handle.paperId}: ${describeError(error)}`);
      }
    }
    return content;
  }

  private failure(handle: PaperHandle, stage: IngestionStage, error: unknown): IngestionResult {
    const retryable = isRetryableError(error);
    const detail = describeError(error);

    if (error instanceof StageFailure) {
      this.logger.warn(`[Ingestion] ${handle.paperId} failed at ${stage}: ${detail}`);
    } else {
      this.logger.error(`[Ingestion] ${handle.paperId} failed at ${stage}: ${detail}`, {
        code: error instanceof AppError ? error.code : undefined,
        retryable,
      });
    }

    return {
      paperId: handle.paperId,
      status: 'failure',
      chunkCount: 0,
      failedStage: stage,
      error: sanitizeErrorMessage(detail),
      retryable,
    };
  }
}
