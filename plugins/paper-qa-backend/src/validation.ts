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
 * Request schemas for the HTTP surface
 *
 * @packageDocumentation
 */

import { z, ZodTypeAny } from 'zod';
import { ValidationError } from './errors';
import { PROVIDER_NAMES } from './models';

export const SearchRequestSchema = z.object({
  query: z.string().trim().min(1, 'query must not be empty'),
  max_results: z.number().int().min(1).max(10).default(3),
});

export const ProcessPapersRequestSchema = z.object({
  paper_ids: z.array(z.string().trim().min(1)).nonempty('No paper IDs provided'),
});

export const QueryRequestSchema = z.object({
  question: z.string().trim().min(1, 'question must not be empty'),
  n_results: z.number().int().min(1).max(20).default(5),
  api_config: z
    .object({
      provider: z.enum(PROVIDER_NAMES),
      api_key: z.string().min(1).optional(),
      model: z.string().min(1).optional(),
    })
    .optional(),
});

export type SearchRequest = z.infer<typeof SearchRequestSchema>;
export type ProcessPapersRequest = z.infer<typeof ProcessPapersRequestSchema>;
export type QueryRequest = z.infer<typeof QueryRequestSchema>;

/**
 * Parse a request body, raising `ValidationError` with one `path: message`
 * entry per issue
 */
export function parseRequest<Schema extends ZodTypeAny>(schema: Schema, body: unknown): z.output<Schema> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const errors = result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw new ValidationError('Invalid request data', errors);
  }
  return result.data;
}
