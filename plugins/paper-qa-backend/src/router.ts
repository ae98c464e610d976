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
 * Express router for the paper QA backend
 * Validates requests, delegates to PaperQaService and shapes responses
 *
 * @packageDocumentation
 */

import express, { NextFunction, Request, Response, Router } from 'express';
import type { Logger } from 'winston';
import { describeError } from './errors';
import { PaperQaService } from './services/PaperQaService';
import { GenerationProviderFactory } from './services/providers/GenerationProviderFactory';
import { toErrorResponse } from './utils/errorResponse';
import { parseRequest, ProcessPapersRequestSchema, QueryRequestSchema, SearchRequestSchema } from './validation';
import { toWireAnswer, toWireBatch, toWirePaper, toWirePaperList, toWireStats } from './wire';

export interface RouterOptions {
  logger: Logger;
  service: PaperQaService;
}

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

/**
 * Forward rejections to the error middleware
 */
export function asyncHandler(fn: AsyncRoute) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

/**
 * Terminal error middleware: everything thrown becomes `{ success: false, detail, errorId }`
 */
export function createErrorHandler(logger: Logger) {
  return (error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const { status, body } = toErrorResponse(error, logger);
    res.status(status).json(body);
  };
}

export function createPaperQaRouter(options: RouterOptions): Router {
  const { logger, service } = options;
  const router = Router();
  router.use(express.json());

  /**
   * POST /search
   */
  router.post(
    '/search',
    asyncHandler(async (req, res) => {
      const { query, max_results } = parseRequest(SearchRequestSchema, req.body);
      const papers = await service.searchPapers(query, max_results);
      const message = papers.length > 0 ? `Found ${papers.length} paper(s)` : 'No papers found for the given query';
      res.json(toWirePaperList(papers, message));
    }),
  );

  /**
   * POST /papers/process
   * Downloads, extracts and indexes the given papers
   */
  router.post(
    '/papers/process',
    asyncHandler(async (req, res) => {
      const { paper_ids } = parseRequest(ProcessPapersRequestSchema, req.body);
      logger.info(`Processing ${paper_ids.length} paper(s)`);
      const batch = await service.processPapers(paper_ids);
      res.json(toWireBatch(batch));
    }),
  );

  router.get(
    '/papers',
    asyncHandler(async (_req, res) => {
      res.json(toWirePaperList(service.listPapers()));
    }),
  );

  router.get(
    '/papers/:paperId',
    asyncHandler(async (req, res) => {
      res.json(toWirePaper(service.getPaper(req.params.paperId)));
    }),
  );

  router.get(
    '/stats',
    asyncHandler(async (_req, res) => {
      res.json(toWireStats(await service.getStats()));
    }),
  );

  /**
   * POST /query
   * Answers a question from the indexed papers. `api_config` selects a
   * provider for this request only.
   */
  router.post(
    '/query',
    asyncHandler(async (req, res) => {
      const { question, n_results, api_config } = parseRequest(QueryRequestSchema, req.body);
      const answer = await service.answerQuestion(question, {
        nResults: n_results,
        provider: api_config?.provider,
        apiKey: api_config?.api_key,
        model: api_config?.model,
      });
      res.json(toWireAnswer(answer));
    }),
  );

  router.get('/providers', (_req: Request, res: Response) => {
    res.json({ success: true, providers: GenerationProviderFactory.supportedProviders() });
  });

  router.get('/health', async (_req: Request, res: Response) => {
    try {
      const stats = await service.getStats();
      res.json({
        status: 'healthy',
        stats: toWireStats(stats),
        guardrails: service.getGuardrailStats(),
      });
    } catch (error) {
      logger.error(`Health check failed: ${describeError(error)}`);
      res.status(503).json({ status: 'unhealthy' });
    }
  });

  router.use(createErrorHandler(logger));

  return router;
}
