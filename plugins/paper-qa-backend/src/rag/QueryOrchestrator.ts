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
 * Question answering over the indexed papers: screen the question, retrieve,
 * generate, then check the answer against what was retrieved.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'crypto';
import type { Logger } from 'winston';
import { ContractViolationError, describeError } from '../errors';
import {
  IConfigService,
  IDocumentStore,
  IGenerationProvider,
  IGuardrailService,
  IPaperRegistry,
  QueryDependencies,
} from '../interfaces';
import { GuardrailVerdict, GuardrailWarning, QueryAnswer, RetrievedChunk, SourceInfo } from '../models';
import { buildPrompt } from './prompt';
import {
  AnswerOptions,
  DEFAULT_N_RESULTS,
  IQueryOrchestrator,
  NO_RESULTS_ANSWER,
  NO_RESULTS_MESSAGE,
  NOTHING_INDEXED_MESSAGE,
  ProviderSource,
} from './types';

function toWarning(verdict: GuardrailVerdict): GuardrailWarning | null {
  if (verdict.isSafe || !verdict.kind) {
    return null;
  }
  return { type: verdict.kind, message: verdict.message ?? '' };
}

export class QueryOrchestrator implements IQueryOrchestrator {
  private readonly logger: Logger;
  private readonly configService: IConfigService;
  private readonly documentStore: IDocumentStore;
  private readonly guardrails: IGuardrailService;
  private readonly registry: IPaperRegistry;
  private readonly provider?: IGenerationProvider;

  constructor(dependencies: QueryDependencies) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
    this.documentStore = dependencies.documentStore;
    this.guardrails = dependencies.guardrails;
    this.registry = dependencies.registry;
    this.provider = dependencies.provider;
  }

  async answer(question: string, options: AnswerOptions = {}): Promise<QueryAnswer> {
    const nResults = options.nResults ?? DEFAULT_N_RESULTS;
    this.logger.info(`[Query] ${question.slice(0, 80)} (nResults=${nResults})`);

    // Blocking: nothing below runs for an unsafe question
    const inputVerdict = this.guardrails.checkInput(question);
    if (!inputVerdict.isSafe) {
      this.logger.warn(`[Query] Blocked by guardrails: ${inputVerdict.kind}`);
      return this.result('blocked', { warning: toWarning(inputVerdict), message: inputVerdict.message });
    }

    const provider = this.resolveProvider(options.provider);

    const { count } = await this.documentStore.stats();
    if (count === 0) {
      return this.result('nothing_indexed', { message: NOTHING_INDEXED_MESSAGE });
    }

    const chunks = await this.documentStore.query(question, nResults);
    if (chunks.length === 0) {
      return this.result('no_results', { answer: NO_RESULTS_ANSWER, message: NO_RESULTS_MESSAGE });
    }
    this.logger.info(`[Query] Retrieved ${chunks.length} chunks`);

    const { maxTokens } = this.configService.getConfig().generation;
    let answer: string;
    try {
      answer = await provider.generate(buildPrompt(question, chunks), maxTokens);
    } catch (error) {
      if (error instanceof ContractViolationError) {
        throw error;
      }
      const errorId = randomUUID();
      this.logger.error(`[Query] Error ID ${errorId}: ${describeError(error)}`, { provider: provider.name });
      return this.result('generation_error', {
        message: `Could not generate an answer with ${provider.name}. Reference: ${errorId}`,
        provider,
        errorId,
      });
    }

    // Advisory: the answer is returned either way
    const outputVerdict = this.guardrails.checkOutput(
      answer,
      chunks.map(chunk => chunk.content),
      question,
    );
    if (!outputVerdict.isSafe) {
      this.logger.warn(`[Query] Answer flagged: ${outputVerdict.kind}`);
    }

    return {
      success: true,
      outcome: 'answered',
      answer,
      sources: this.collectSources(chunks),
      warning: toWarning(outputVerdict),
      message: null,
      provider: provider.name,
      model: provider.model,
    };
  }

  private resolveProvider(source: ProviderSource | undefined): IGenerationProvider {
    const provider = typeof source === 'function' ? source() : source ?? this.provider;
    if (!provider) {
      throw new ContractViolationError('No generation provider given for the question');
    }
    return provider;
  }

  /**
   * One entry per paper in first-seen rank order; papers the registry does
   * not know are left out
   */
  collectSources(chunks: RetrievedChunk[]): SourceInfo[] {
    const seen = new Set<string>();
    const sources: SourceInfo[] = [];

    for (const chunk of chunks) {
      const { paperId } = chunk.metadata;
      if (seen.has(paperId)) {
        continue;
      }
      const paper = this.registry.get(paperId);
      if (!paper) {
        continue;
      }
      seen.add(paperId);
      sources.push({
        paperId,
        title: paper.title,
        authors: paper.authors,
        published: paper.published,
        url: paper.url,
      });
    }
    return sources;
  }

  private result(
    outcome: QueryAnswer['outcome'],
    fields: {
      answer?: string;
      warning?: GuardrailWarning | null;
      message?: string | null;
      provider?: IGenerationProvider;
      errorId?: string;
    },
  ): QueryAnswer {
    return {
      success: false,
      outcome,
      answer: fields.answer ?? '',
      sources: [],
      warning: fields.warning ?? null,
      message: fields.message ?? null,
      provider: fields.provider?.name,
      model: fields.provider?.model,
      errorId: fields.errorId,
    };
  }
}
