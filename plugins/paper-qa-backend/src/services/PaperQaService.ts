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
 * Paper QA service
 * Composes search, ingestion and question answering behind one entry point
 *
 * @packageDocumentation
 */

import { Config } from '@backstage/config';
import type { Logger } from 'winston';
import { NotFoundError } from '../errors';
import {
  IConfigService,
  IDocumentStore,
  IGenerationProvider,
  IIngestionPipeline,
  IPaperRegistry,
  IPaperSource,
  IVectorStore,
  ServiceDependencies,
} from '../interfaces';
import {
  BatchResult,
  IngestionResult,
  PaperHandle,
  PaperMetadata,
  ProviderName,
  QueryAnswer,
} from '../models';
import { IQueryOrchestrator, QueryOrchestrator } from '../rag';
import { ArxivPaperSource, isSamePaper } from './ArxivPaperSource';
import { ConfigService } from './ConfigService';
import { DocumentStore } from './DocumentStore';
import { GuardrailService, GuardrailStats } from './GuardrailService';
import { InMemoryPaperRegistry } from './InMemoryPaperRegistry';
import { IngestionPipeline } from './IngestionPipeline';
import { OllamaEmbeddingService } from './OllamaEmbeddingService';
import { PaperCache } from './PaperCache';
import { PdfTextExtractor } from './PdfTextExtractor';
import { GenerationProviderFactory } from './providers/GenerationProviderFactory';
import { VectorStoreFactory } from './VectorStoreFactory';

export interface PaperQaServiceDependencies extends ServiceDependencies {
  source: IPaperSource;
  pipeline: IIngestionPipeline;
  documentStore: IDocumentStore;
  registry: IPaperRegistry;
  orchestrator: IQueryOrchestrator;
  providers: GenerationProviderFactory;
  guardrails: GuardrailService;
  vectorStore?: IVectorStore;
}

/**
 * Per-question options. Any of `provider`, `apiKey` or `model` builds a
 * provider for this question only.
 */
export interface QuestionOptions {
  nResults?: number;
  provider?: ProviderName;
  apiKey?: string;
  model?: string;
}

export interface PaperQaStats {
  papersProcessed: number;
  chunksIndexed: number;
  collectionName: string;
}

/**
 * Service that orchestrates search, ingestion and answering
 * Follows Single Responsibility and Open/Closed principles
 */
export class PaperQaService {
  private readonly logger: Logger;
  private readonly configService: IConfigService;
  private readonly source: IPaperSource;
  private readonly pipeline: IIngestionPipeline;
  private readonly documentStore: IDocumentStore;
  private readonly registry: IPaperRegistry;
  private readonly orchestrator: IQueryOrchestrator;
  private readonly providers: GenerationProviderFactory;
  private readonly guardrails: GuardrailService;
  private readonly vectorStore?: IVectorStore;
  private defaultProvider?: IGenerationProvider;

  constructor(dependencies: PaperQaServiceDependencies) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
    this.source = dependencies.source;
    this.pipeline = dependencies.pipeline;
    this.documentStore = dependencies.documentStore;
    this.registry = dependencies.registry;
    this.orchestrator = dependencies.orchestrator;
    this.providers = dependencies.providers;
    this.guardrails = dependencies.guardrails;
    this.vectorStore = dependencies.vectorStore;
  }

  /**
   * Wire every collaborator from configuration and open the collection
   */
  static async create(env: { logger: Logger; config: Config }): Promise<PaperQaService> {
    const { logger } = env;
    const configService = new ConfigService(env.config);
    const appConfig = configService.getConfig();
    const dependencies = { logger, config: configService };

    const vectorStore = await VectorStoreFactory.create(configService, logger);
    const documentStore = new DocumentStore({
      ...dependencies,
      vectorStore,
      embeddings: new OllamaEmbeddingService(dependencies),
    });
    await documentStore.ensureCollection(appConfig.collectionName);

    const registry = new InMemoryPaperRegistry();
    const source = new ArxivPaperSource(dependencies);
    const guardrails = new GuardrailService(logger);
    const providers = new GenerationProviderFactory(dependencies);

    const pipeline = new IngestionPipeline({
      ...dependencies,
      source,
      extractor: new PdfTextExtractor(dependencies),
      documentStore,
      registry,
      cache: new PaperCache(appConfig.downloadDir, logger),
    });

    const orchestrator = new QueryOrchestrator({
      ...dependencies,
      documentStore,
      guardrails,
      registry,
    });

    logger.info(`Paper QA ready (collection ${appConfig.collectionName}, provider ${appConfig.generation.provider})`);

    return new PaperQaService({
      ...dependencies,
      source,
      pipeline,
      documentStore,
      registry,
      orchestrator,
      providers,
      guardrails,
      vectorStore,
    });
  }

  async searchPapers(query: string, maxResults?: number): Promise<PaperHandle[]> {
    return this.source.search(query, maxResults ?? this.configService.getConfig().maxPapers);
  }

  /**
   * Resolve ids through the source, then ingest. An id without a version
   * matches the version the source returns. Ids the source does not know
   * are reported as failures in their input position.
   */
  async processPapers(paperIds: string[]): Promise<BatchResult> {
    const handles = await this.source.lookup(paperIds);
    const resolved = paperIds.map(id => handles.find(handle => isSamePaper(id, handle.paperId)));

    const toProcess = new Map<string, PaperHandle>();
    for (const handle of resolved) {
      if (handle && !toProcess.has(handle.paperId)) {
        toProcess.set(handle.paperId, handle);
      }
    }

    const batch = await this.pipeline.processBatch([...toProcess.values()]);
    const processed = new Map(batch.results.map(result => [result.paperId, result]));

    const results = paperIds.map((id, index): IngestionResult => {
      const handle = resolved[index];
      return (
        (handle && processed.get(handle.paperId)) ?? {
          paperId: id,
          status: 'failure',
          chunkCount: 0,
          failedStage: 'fetch',
          error: `Paper ${id} not found`,
          retryable: false,
        }
      );
    });
    const successful = results.filter(result => result.status === 'success').length;

    return { total: results.length, successful, failed: results.length - successful, results };
  }

  async answerQuestion(question: string, options: QuestionOptions = {}): Promise<QueryAnswer> {
    return this.orchestrator.answer(question, {
      nResults: options.nResults,
      provider: () => this.resolveProvider(options),
    });
  }

  /**
   * A provider built for this question when it overrides anything, otherwise
   * the configured one, built on first use so that a missing key only fails
   * questions
   */
  private resolveProvider(options: QuestionOptions): IGenerationProvider {
    const { provider, apiKey, model } = options;
    if (provider || apiKey || model) {
      const name = provider ?? this.configService.getConfig().generation.provider;
      this.logger.info(`Using request provider ${name}${model ? ` (${model})` : ''}`);
      return this.providers.create(name, { apiKey, model });
    }

    if (!this.defaultProvider) {
      this.defaultProvider = this.providers.createDefault();
    }
    return this.defaultProvider;
  }

  listPapers(): PaperMetadata[] {
    return this.registry.list();
  }

  getPaper(paperId: string): PaperMetadata {
    const paper = this.registry.get(paperId);
    if (!paper) {
      throw new NotFoundError('Paper', paperId);
    }
    return paper;
  }

  async getStats(): Promise<PaperQaStats> {
    const { count, collectionName } = await this.documentStore.stats();
    return {
      papersProcessed: this.registry.size(),
      chunksIndexed: count,
      collectionName,
    };
  }

  getGuardrailStats(): GuardrailStats {
    return this.guardrails.getStats();
  }

  async close(): Promise<void> {
    await this.vectorStore?.close?.();
  }
}
