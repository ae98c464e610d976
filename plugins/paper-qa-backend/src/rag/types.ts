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
 * Query protocol types
 *
 * @packageDocumentation
 */

import { IGenerationProvider } from '../interfaces';
import { QueryAnswer } from '../models';

export const DEFAULT_N_RESULTS = 5;

export const NOTHING_INDEXED_MESSAGE =
  'No papers have been processed yet. Please search and process papers first.';

export const NO_RESULTS_ANSWER = "I couldn't find any relevant information in the indexed papers.";

export const NO_RESULTS_MESSAGE = 'Could not find relevant information in indexed papers';

/**
 * A provider, or a function that builds one. A function is called only once
 * the question has passed the input guardrails.
 */
export type ProviderSource = IGenerationProvider | (() => IGenerationProvider);

/**
 * Options for a single question
 */
export interface AnswerOptions {
  /** Chunks to retrieve, default 5 */
  nResults?: number;
  /** Replaces the default provider for this question only */
  provider?: ProviderSource;
}

/**
 * Contract of the question-answering protocol
 */
export interface IQueryOrchestrator {
  answer(question: string, options?: AnswerOptions): Promise<QueryAnswer>;
}
