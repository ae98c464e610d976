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
 * Turns thrown errors into caller-safe responses. Full detail goes to the
 * log under a correlation id; callers only ever see the id and a short,
 * scrubbed message.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'crypto';
import type { Logger } from 'winston';
import { AppError, describeError, ValidationError } from '../errors';

export const GENERIC_ERROR_MESSAGE = 'An error occurred while processing your request';
export const INTERNAL_ERROR_MESSAGE = 'An internal error occurred. Please try again later.';

const MAX_MESSAGE_LENGTH = 500;

/**
 * Markers of paths, stack frames and credentials
 */
const SENSITIVE_PATTERNS: RegExp[] = [
  /(?:^|[\s"'(=])\/(?:home|usr|var|etc|tmp|root|opt|srv|app|Users)\//,
  /[A-Za-z]:\\/,
  /\bat\s+\S+\s+\(.*:\d+:\d+\)/,
  /\.(?:ts|js|mjs|cjs):\d+/,
  /node_modules/,
  /api[_-]?key/i,
  /password/i,
  /\btoken\b/i,
  /secret/i,
  /authorization|bearer\s/i,
  /\bsk-[A-Za-z0-9_-]{6,}/,
  /\b(?:postgres(?:ql)?|mongodb(?:\+srv)?|redis):\/\//i,
];

export interface ErrorResponse {
  success: false;
  detail: string;
  errorId: string;
  errors?: string[];
}

/**
 * First line of the message, or a generic message when it carries anything
 * sensitive
 */
export function sanitizeErrorMessage(message: string): string {
  const firstLine = message.split('\n')[0].trim();
  if (!firstLine || SENSITIVE_PATTERNS.some(pattern => pattern.test(message))) {
    return GENERIC_ERROR_MESSAGE;
  }
  return firstLine.length > MAX_MESSAGE_LENGTH ? `${firstLine.slice(0, MAX_MESSAGE_LENGTH)}...` : firstLine;
}

export function toErrorResponse(error: unknown, logger: Logger): { status: number; body: ErrorResponse } {
  const errorId = randomUUID();

  if (error instanceof ValidationError) {
    logger.warn(`Validation error ${errorId}: ${error.errors.join('; ')}`);
    return {
      status: error.statusCode,
      body: { success: false, detail: 'Invalid request data', errors: error.errors, errorId },
    };
  }

  if (error instanceof AppError && error.isOperational) {
    logger.warn(`Error ID ${errorId} [${error.code}]: ${error.message}`);
    return {
      status: error.statusCode,
      body: { success: false, detail: sanitizeErrorMessage(error.message), errorId },
    };
  }

  logger.error(`Error ID ${errorId}: ${describeError(error)}`, {
    errorId,
    stack: error instanceof Error ? error.stack : undefined,
  });
  return {
    status: error instanceof AppError ? error.statusCode : 500,
    body: { success: false, detail: INTERNAL_ERROR_MESSAGE, errorId },
  };
}
