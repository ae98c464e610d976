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
import { createTestConfig, createTestLogger } from '../testing';
import { InMemoryVectorStore } from './InMemoryVectorStore';
import { PgVectorStore } from './PgVectorStore';
import { VectorStoreFactory } from './VectorStoreFactory';

const mockClient = {
  query: jest.fn<(text: string) => Promise<{ rows: Array<Record<string, unknown>> }>>(),
  release: jest.fn(),
};

const mockPool = {
  connect: jest.fn(async () => mockClient),
  end: jest.fn(async () => undefined),
  on: jest.fn(),
};

jest.mock('pg', () => ({
  Pool: jest.fn(() => mockPool),
}));

const postgresConfig = () =>
  createTestConfig({ vectorStore: { type: 'postgresql', postgresql: { password: 'test-secret' } } });

describe('VectorStoreFactory', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    mockClient.query.mockReset();
  });

  it('uses the in-memory store by default', async () => {
    const store = await VectorStoreFactory.create(createTestConfig(), createTestLogger());

    expect(store).toBeInstanceOf(InMemoryVectorStore);
    expect(mockPool.connect).not.toHaveBeenCalled();
  });

  it('creates an initialized PostgreSQL store when configured', async () => {
    mockClient.query
      .mockResolvedValueOnce({ rows: [{ now: new Date() }] })
      .mockResolvedValueOnce({ rows: [{ installed: true }] })
      .mockResolvedValueOnce({ rows: [{ exists: true }] });

    const store = await VectorStoreFactory.create(postgresConfig(), createTestLogger());

    expect(store).toBeInstanceOf(PgVectorStore);
  });

  it('falls back to memory when PostgreSQL is unreachable', async () => {
    mockPool.connect.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

    const store = await VectorStoreFactory.create(postgresConfig(), createTestLogger());

    expect(store).toBeInstanceOf(InMemoryVectorStore);
    expect(mockPool.end).toHaveBeenCalledTimes(1);
  });

  it('does not fall back when the fallback is turned off', async () => {
    mockPool.connect.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));
    const config = createTestConfig({
      vectorStore: { type: 'postgresql', fallbackToMemory: false, postgresql: { password: 'test-secret' } },
    });

    await expect(VectorStoreFactory.create(config, createTestLogger())).rejects.toThrow(
      'PgVectorStore initialization failed: connect ECONNREFUSED',
    );
    expect(mockPool.end).not.toHaveBeenCalled();
  });
});
