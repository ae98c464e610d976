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
 * Prompt template for grounded answers
 *
 * @packageDocumentation
 */

import { RetrievedChunk } from '../models';

/**
 * Each excerpt prefixed with the title of the paper it came from
 */
export function buildContext(chunks: RetrievedChunk[]): string {
  return chunks.map(chunk => `[From: ${chunk.metadata.title}]\n${chunk.content}`).join('\n\n');
}

export function buildPrompt(question: string, chunks: RetrievedChunk[]): string {
  return `You are a helpful scientific research assistant. You have access to content from relevant research papers.

Based on the following excerpts from scientific papers, please answer the user's question. Be specific and cite which paper you're referencing when possible.

Research Paper Excerpts:
${buildContext(chunks)}

User Question: ${question}

Please provide a clear, well-structured answer based on the papers above. If the papers don't contain enough information to fully answer the question, acknowledge this.`;
}
