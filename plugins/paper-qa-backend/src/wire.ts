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
 * Response shapes sent over HTTP (snake_case field names)
 *
 * @packageDocumentation
 */

import { BatchResult, IngestionResult, PaperMetadata, QueryAnswer, SourceInfo } from './models';
import type { PaperQaStats } from './services/PaperQaService';

export interface WirePaper {
  paper_id: string;
  title: string;
  authors: string[];
  published: string;
  url: string;
  pdf_url: string;
  summary: string;
  categories: string[];
}

export interface WireIngestionResult {
  paper_id: string;
  status: IngestionResult['status'];
  chunk_count: number;
  failed_stage?: IngestionResult['failedStage'];
  error?: string;
  retryable?: boolean;
}

export interface WireSource {
  paper_id: string;
  title: string;
  authors: string[];
  published: string;
  url: string;
}

export function toWirePaper(paper: PaperMetadata): WirePaper {
  return {
    paper_id: paper.paperId,
    title: paper.title,
    authors: paper.authors,
    published: paper.published,
    url: paper.url,
    pdf_url: paper.pdfUrl,
    summary: paper.summary,
    categories: paper.categories,
  };
}

export function toWirePaperList(papers: PaperMetadata[], message?: string) {
  return {
    success: true,
    papers: papers.map(toWirePaper),
    count: papers.length,
    ...(message ? { message } : {}),
  };
}

function toWireResult(result: IngestionResult): WireIngestionResult {
  return {
    paper_id: result.paperId,
    status: result.status,
    chunk_count: result.chunkCount,
    ...(result.status === 'failure'
      ? { failed_stage: result.failedStage, error: result.error, retryable: result.retryable }
      : {}),
  };
}

/**
 * `success` when at least one paper was indexed
 */
export function toWireBatch(batch: BatchResult) {
  return {
    success: batch.successful > 0,
    total: batch.total,
    processed: batch.successful,
    failed: batch.failed,
    message: `Successfully processed ${batch.successful} out of ${batch.total} papers`,
    results: batch.results.map(toWireResult),
  };
}

function toWireSource(source: SourceInfo): WireSource {
  return {
    paper_id: source.paperId,
    title: source.title,
    authors: source.authors,
    published: source.published,
    url: source.url,
  };
}

export function toWireAnswer(answer: QueryAnswer) {
  return {
    success: answer.success,
    outcome: answer.outcome,
    answer: answer.answer,
    sources: answer.sources.map(toWireSource),
    warning: answer.warning,
    message: answer.message,
    ...(answer.provider ? { provider: answer.provider, model: answer.model } : {}),
    ...(answer.errorId ? { error_id: answer.errorId } : {}),
  };
}

export function toWireStats(stats: PaperQaStats) {
  return {
    success: true,
    papers_processed: stats.papersProcessed,
    chunks_indexed: stats.chunksIndexed,
    collection_name: stats.collectionName,
  };
}
