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
 * Embedding service backed by a local Ollama server
 *
 * @packageDocumentation
 */

import fetch from 'node-fetch';
import type { Logger } from 'winston';
import { describeError, EmbeddingError } from '../errors';
import { IConfigService, IEmbeddingService, ServiceDependencies } from '../interfaces';
import { OllamaEmbedResponseSchema } from '../models';

/**
 * Turns chunk and query text into vectors through Ollama's `/api/embed`
 * Follows Single Responsibility and Dependency Inversion principles
 */
export class OllamaEmbeddingService implements IEmbeddingService {
  private readonly logger: Logger;
  private readonly configService: IConfigService;
  private readonly baseUrl: string;

  constructor(dependencies: ServiceDependencies) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
    this.baseUrl = this.configService.getConfig().ollamaBaseUrl.replace(/\/+$/, '');
  }

  async embed(inputs: string[]): Promise<number[][]> {
    if (inputs.length === 0) {
      return [];
    }

    const { embeddingModel, timeouts } = this.configService.getConfig();
    this.logger.debug(`Generating embeddings for ${inputs.length} inputs with model: ${embeddingModel}`);

    let body: unknown;
    try {
      const response = await fetch(`${this.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: embeddingModel, input: inputs }),
        timeout: timeouts.storeMs,
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new EmbeddingError(`Ollama API error (${response.status}): ${errorText}`);
      }
      body = await response.json();
    } catch (error) {
      this.logger.error(`Failed to generate embeddings: ${describeError(error)}`);
      if (error instanceof EmbeddingError) {
        throw error;
      }
      throw new EmbeddingError(`Embedding generation failed: ${describeError(error)}`, error);
    }

    const parsed = OllamaEmbedResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EmbeddingError('Invalid embeddings response format from Ollama', parsed.error);
    }
    if (parsed.data.embeddings.length !== inputs.length) {
      throw new EmbeddingError(
        `Ollama returned ${parsed.data.embeddings.length} embeddings for ${inputs.length} inputs`,
      );
    }

    return parsed.data.embeddings;
  }
}
