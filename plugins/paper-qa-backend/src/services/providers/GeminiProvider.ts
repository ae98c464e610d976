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
 * Google Gemini provider over the Generative Language REST API
 *
 * @packageDocumentation
 */

import fetch from 'node-fetch';
import { z } from 'zod';
import { ProviderName } from '../../models';
import { BaseGenerationProvider, ProviderOptions } from './BaseGenerationProvider';

export const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string().optional() })),
        }),
        finishReason: z.string().optional(),
      }),
    )
    .nonempty('No candidates returned'),
});

export class GeminiProvider extends BaseGenerationProvider {
  static readonly DEFAULT_MODEL: string = 'gemini-1.5-pro';

  readonly name: ProviderName = 'gemini';
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(options: ProviderOptions) {
    super(options);
    this.apiKey = options.apiKey ?? '';
    this.baseUrl = (options.baseUrl || GEMINI_BASE_URL).replace(/\/+$/, '');
  }

  defaultModel(): string {
    return GeminiProvider.DEFAULT_MODEL;
  }

  protected async complete(prompt: string, maxTokens: number): Promise<string> {
    const response = await fetch(`${this.baseUrl}/models/${encodeURIComponent(this.model)}:generateContent`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'x-goog-api-key': this.apiKey },
      body: JSON.stringify({
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        generationConfig: { maxOutputTokens: maxTokens },
      }),
      timeout: this.timeoutMs,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Gemini API error (${response.status}): ${errorText}`);
    }

    const parsed = GeminiResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Invalid response format from Gemini: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }

    return parsed.data.candidates[0].content.parts
      .map(part => part.text ?? '')
      .join('')
      .trim();
  }
}
