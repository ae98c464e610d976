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
 * Provider for a local Ollama server
 * Handles chat completions through the Ollama API
 *
 * @packageDocumentation
 */

import fetch from 'node-fetch';
import { OllamaChatResponseSchema, ProviderName } from '../../models';
import { BaseGenerationProvider, ProviderOptions } from './BaseGenerationProvider';

export const OLLAMA_BASE_URL = 'http://localhost:11434';

export class OllamaProvider extends BaseGenerationProvider {
  static readonly DEFAULT_MODEL: string = 'llama3.2';

  readonly name: ProviderName = 'ollama';
  private readonly baseUrl: string;

  constructor(options: ProviderOptions) {
    super(options);
    this.baseUrl = (options.baseUrl || OLLAMA_BASE_URL).replace(/\/+$/, '');
  }

  defaultModel(): string {
    return OllamaProvider.DEFAULT_MODEL;
  }

  protected async complete(prompt: string, maxTokens: number): Promise<string> {
    const response = await fetch(`${this.baseUrl}/api/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        stream: false,
        options: { num_predict: maxTokens },
      }),
      timeout: this.timeoutMs,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Ollama API error (${response.status}): ${errorText}`);
    }

    const parsed = OllamaChatResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Invalid response format from Ollama');
    }

    return parsed.data.message.content;
  }
}
