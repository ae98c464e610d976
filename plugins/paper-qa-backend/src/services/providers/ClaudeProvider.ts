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
 * Anthropic Claude provider
 *
 * @packageDocumentation
 */

import Anthropic from '@anthropic-ai/sdk';
import { ProviderName } from '../../models';
import { BaseGenerationProvider, ProviderOptions } from './BaseGenerationProvider';

export class ClaudeProvider extends BaseGenerationProvider {
  static readonly DEFAULT_MODEL: string = 'claude-sonnet-4-20250514';

  readonly name: ProviderName = 'claude';
  private readonly client: Anthropic;

  constructor(options: ProviderOptions) {
    super(options);
    this.client = new Anthropic({ apiKey: options.apiKey, maxRetries: 0, timeout: options.timeoutMs });
  }

  defaultModel(): string {
    return ClaudeProvider.DEFAULT_MODEL;
  }

  protected async complete(prompt: string, maxTokens: number): Promise<string> {
    const message = await this.client.messages.create({
      model: this.model,
      max_tokens: maxTokens,
      messages: [{ role: 'user', content: prompt }],
    });

    return message.content
      .flatMap(block => (block.type === 'text' ? [block.text] : []))
      .join('\n')
      .trim();
  }
}
