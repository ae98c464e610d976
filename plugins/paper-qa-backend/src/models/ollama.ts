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
 * Zod schemas for Ollama API responses
 *
 * @packageDocumentation
 */

import { z } from 'zod';

export const OllamaChatResponseSchema = z.object({
  model: z.string(),
  created_at: z.string().optional(),
  message: z.object({
    role: z.string(),
    content: z.string().min(1, 'Empty message content'),
  }),
  done: z.boolean(),
});

export const OllamaEmbedResponseSchema = z.object({
  model: z.string(),
  embeddings: z.array(z.array(z.number())),
});

export type OllamaChatResponse = z.infer<typeof OllamaChatResponseSchema>;
export type OllamaEmbedResponse = z.infer<typeof OllamaEmbedResponseSchema>;
