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
import OpenAI from 'openai';
import { GenerationFailedError } from '../../errors';
import { createTestLogger } from '../../testing';
import { DeepSeekProvider } from './DeepSeekProvider';
import { OpenAIProvider } from './OpenAIProvider';

const mockCreate = jest.fn<(params: unknown) => Promise<unknown>>();

jest.mock('openai', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({
    chat: { completions: { create: (params: unknown) => mockCreate(params) } },
  })),
}));

const options = { logger: createTestLogger(), timeoutMs: 1000, apiKey: 'test-secret' };

describe('OpenAIProvider', () => {
  beforeEach(() => {
    mockCreate.mockReset();
  });

  it('returns the first choice', async () => {
    mockCreate.mockResolvedValueOnce({ choices: [{ message: { role: 'assistant', content: 'The answer' } }] });

    await expect(new OpenAIProvider(options).generate('Explain', 300)).resolves.toBe('The answer');
    expect(mockCreate).toHaveBeenCalledWith({
      model: 'gpt-4o',
      messages: [{ role: 'user', content: 'Explain' }],
      max_tokens: 300,
    });
    expect(jest.mocked(OpenAI)).toHaveBeenLastCalledWith({
      apiKey: 'test-secret',
      baseURL: undefined,
      maxRetries: 0,
      timeout: 1000,
    });
  });

  it('treats a null completion as a failure', async () => {
    mockCreate.mockResolvedValueOnce({ choices: [{ message: { role: 'assistant', content: null } }] });

    await expect(new OpenAIProvider(options).generate('Explain', 300)).rejects.toThrow(GenerationFailedError);
  });

  it('wraps SDK failures', async () => {
    mockCreate.mockRejectedValueOnce(new Error('Rate limit reached'));

    await expect(new OpenAIProvider(options).generate('Explain', 300)).rejects.toMatchObject({
      provider: 'openai',
      message: 'Failed to generate response from openai: Rate limit reached',
    });
  });
});

describe('DeepSeekProvider', () => {
  beforeEach(() => {
    mockCreate.mockReset();
  });

  it('talks to the DeepSeek endpoint with its own default model', async () => {
    mockCreate.mockResolvedValueOnce({ choices: [{ message: { role: 'assistant', content: 'Deep answer' } }] });
    const provider = new DeepSeekProvider(options);

    await expect(provider.generate('Explain', 100)).resolves.toBe('Deep answer');
    expect(provider.name).toBe('deepseek');
    expect(jest.mocked(OpenAI)).toHaveBeenLastCalledWith(
      expect.objectContaining({ baseURL: 'https://api.deepseek.com' }),
    );
    expect(mockCreate).toHaveBeenCalledWith(expect.objectContaining({ model: 'deepseek-chat' }));
  });

  it('declares its own default model apart from OpenAI', () => {
    expect(DeepSeekProvider.DEFAULT_MODEL).toBe('deepseek-chat');
    expect(OpenAIProvider.DEFAULT_MODEL).toBe('gpt-4o');
    expect(new DeepSeekProvider(options).defaultModel()).toBe('deepseek-chat');
  });

  it('names itself in failures', async () => {
    mockCreate.mockRejectedValueOnce(new Error('Insufficient Balance'));

    await expect(new DeepSeekProvider(options).generate('Explain', 100)).rejects.toMatchObject({
      provider: 'deepseek',
    });
  });
});
