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
 * Shared behaviour for answer-generation backends
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { describeError, GenerationFailedError } from '../../errors';
import { IGenerationProvider } from '../../interfaces';
import { ProviderName } from '../../models';

export interface ProviderOptions {
  logger: Logger;
  /** Request timeout handed to the backend client */
  timeoutMs: number;
  apiKey?: string;
  /** Overrides the provider's default model */
  model?: string;
  /** Overrides the provider's endpoint */
  baseUrl?: string;
}

/**
 * Turns one `(prompt, maxTokens)` request into a backend call and maps every
 * backend failure to `GenerationFailedError`. No retries at this layer.
 */
export abstract class BaseGenerationProvider implements IGenerationProvider {
  abstract readonly name: ProviderName;
  readonly model: string;
  protected readonly logger: Logger;
  protected readonly timeoutMs: number;

  protected constructor(options: ProviderOptions) {
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs;
    this.model = options.model || this.defaultModel();
  }

  abstract defaultModel(): string;

  /**
   * Backend-specific request; returns the generated text
   */
  protected abstract complete(prompt: string, maxTokens: number): Promise<string>;

  async generate(prompt: string, maxTokens: number): Promise<string> {
    this.logger.info(`Generating answer with ${this.name} (${this.model})`);

    try {
      const text = await this.complete(prompt, maxTokens);
      if (!text.trim()) {
        throw new Error('Empty response');
      }
      return text;
    } catch (error) {
      this.logger.error(`${this.name} API error: ${describeError(error)}`);
      throw new GenerationFailedError(this.name, error);
    }
  }
}
