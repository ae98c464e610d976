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
 * Error hierarchy shared by every service.
 *
 * Operational errors (`isOperational`) carry messages that are safe to show a
 * caller; anything else is reported through a correlation id only.
 *
 * @packageDocumentation
 */

export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly retryable: boolean;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    options: {
      statusCode?: number;
      retryable?: boolean;
      isOperational?: boolean;
      context?: Record<string, unknown>;
      cause?: unknown;
    } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = options.statusCode ?? 500;
    this.retryable = options.retryable ?? false;
    this.isOperational = options.isOperational ?? true;
    this.context = options.context;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { isOperational: false, context });
  }
}

/**
 * A caller broke a method's contract. Never retried.
 */
export class ContractViolationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONTRACT_VIOLATION', { isOperational: false, context });
  }
}

export class NotInitializedError extends ContractViolationError {
  constructor(component: string) {
    super(`${component} not initialized. Call ensureCollection() first.`, { component });
  }
}

export class ValidationError extends AppError {
  public readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super(message, 'VALIDATION_ERROR', { statusCode: 422, context: { errors } });
    this.errors = errors;
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier: string) {
    super(`${resource} ${identifier} not found`, 'NOT_FOUND', { statusCode: 404, context: { resource, identifier } });
  }
}

export class UnsupportedProviderError extends AppError {
  constructor(provider: string, supported: readonly string[]) {
    super(
      `Unsupported provider: ${provider}. Supported providers: ${supported.join(', ')}`,
      'UNSUPPORTED_PROVIDER',
      { statusCode: 400, context: { provider } },
    );
  }
}

export class MissingApiKeyError extends AppError {
  constructor(provider: string) {
    super(`An API key is required for provider ${provider}`, 'MISSING_API_KEY', {
      statusCode: 400,
      context: { provider },
    });
  }
}

/**
 * Uniform failure raised by every generation provider
 */
export class GenerationFailedError extends AppError {
  public readonly provider: string;

  constructor(provider: string, cause: unknown) {
    super(
      `Failed to generate response from ${provider}: ${describeError(cause)}`,
      'GENERATION_FAILED',
      { statusCode: 502, isOperational: false, cause, context: { provider } },
    );
    this.provider = provider;
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(limitBytes: number, receivedBytes: number) {
    super(
      `Document too large: ${formatMegabytes(receivedBytes)} received (max: ${formatMegabytes(limitBytes)})`,
      'PAYLOAD_TOO_LARGE',
      { statusCode: 413, context: { limitBytes, receivedBytes } },
    );
  }
}

export class PageLimitExceededError extends AppError {
  constructor(maxPages: number, pageCount: number) {
    super(`Document has ${pageCount} pages (max: ${maxPages})`, 'PAGE_LIMIT_EXCEEDED', {
      statusCode: 413,
      context: { maxPages, pageCount },
    });
  }
}

/**
 * The extractor could not read the document at all
 */
export class ExtractionError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'EXTRACTION_FAILED', { statusCode: 422, cause });
  }
}

/**
 * Failure talking to the paper source. `retryable` marks rate limits,
 * server errors, timeouts and dropped connections.
 */
export class SourceFetchError extends AppError {
  public readonly status?: number;
  public readonly retryAfterMs?: number;

  constructor(
    message: string,
    options: { status?: number; retryable: boolean; retryAfterMs?: number; cause?: unknown },
  ) {
    super(message, options.status === 429 ? 'SOURCE_RATE_LIMITED' : 'SOURCE_FETCH_FAILED', {
      statusCode: 502,
      retryable: options.retryable,
      cause: options.cause,
      context: { status: options.status },
    });
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
  }
}

/**
 * The embedding backend failed or answered with something unusable
 */
export class EmbeddingError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'EMBEDDING_FAILED', { statusCode: 502, retryable: true, cause });
  }
}

export class TimeoutError extends AppError {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT', {
      statusCode: 504,
      retryable: true,
      context: { operation, timeoutMs },
    });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatMegabytes(bytes: number): string {
  return `${(bytes / 1024 / 1024).toFixed(1)}MB`;
}
