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
 * OpenAI chat completions provider, also the base for OpenAI-compatible APIs
 *
 * @packageDocumentation
 */

import OpenAI from 'openai';
import { ProviderName } from '../../models';
import { BaseGenerationProvider, ProviderOptions } from './BaseGenerationProvider';

export class OpenAIProvider extends BaseGenerationProvider {
  static readonly DEFAULT_MODEL: string = 'gpt-4o';

  readonly name: ProviderName = 'openai';
  private readonly client: OpenAI;

  constructor(options: ProviderOptions) {
    super(options);
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      maxRetries: 0,
      timeout: options.timeoutMs,
    });
  }

  defaultModel(): string {
    return OpenAIProvider.DEFAULT_MODEL;
  }

  protected async complete(prompt: string, maxTokens: number): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: 'user', content: prompt }],
      max_tokens: maxTokens,
    });

    return response.choices[0]?.message.content ?? '';
  }
}
