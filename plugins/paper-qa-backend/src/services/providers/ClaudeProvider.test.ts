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

import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import Anthropic from '@anthropic-ai/sdk';
import { GenerationFailedError } from '../../errors';
import { createTestLogger } from '../../testing';
import { ClaudeProvider } from './ClaudeProvider';

const mockCreate = jest.fn<(params: unknown) => Promise<unknown>>();

jest.mock('@anthropic-ai/sdk', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({
    messages: { create: (params: unknown) => mockCreate(params) },
  })),
}));

describe('ClaudeProvider', () => {
  beforeEach(() => {
    mockCreate.mockReset();
  });

  const build = (model?: string) =>
    new ClaudeProvider({ logger: createTestLogger(), timeoutMs: 1000, apiKey: 'test-secret', model });

  it('builds a client without SDK retries', () => {
    build();

    expect(jest.mocked(Anthropic)).toHaveBeenLastCalledWith({ apiKey: 'test-secret', maxRetries: 0, timeout: 1000 });
  });

  it('sends the prompt as a single user message and joins text blocks', async () => {
    mockCreate.mockResolvedValueOnce({
      content: [
        { type: 'text', text: 'Part A' },
        { type: 'text', text: 'Part B' },
      ],
    });

    await expect(build().generate('Explain the method', 500)).resolves.toBe('Part A\nPart B');
    expect(mockCreate).toHaveBeenCalledWith({
      model: 'claude-sonnet-4-20250514',
      max_tokens: 500,
      messages: [{ role: 'user', content: 'Explain the method' }],
    });
  });

  it('uses an explicit model', async () => {
    mockCreate.mockResolvedValueOnce({ content: [{ type: 'text', text: 'ok' }] });
    const provider = build('claude-3-5-haiku-20241022');

    await provider.generate('q', 10);

    expect(provider.model).toBe('claude-3-5-haiku-20241022');
    expect(mockCreate).toHaveBeenCalledWith(expect.objectContaining({ model: 'claude-3-5-haiku-20241022' }));
  });

  it('wraps SDK failures', async () => {
    mockCreate.mockRejectedValueOnce(new Error('overloaded'));

    const error = await build().generate('q', 10).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationFailedError);
    expect(error).toMatchObject({ provider: 'claude', message: 'Failed to generate response from claude: overloaded' });
  });

  it('treats an answer without text as a failure', async () => {
    mockCreate.mockResolvedValueOnce({ content: [] });

    await expect(build().generate('q', 10)).rejects.toThrow('Failed to generate response from claude: Empty response');
  });
});
