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
 * Process logger
 *
 * @packageDocumentation
 */

import { createLogger as createWinstonLogger, format, Logger, transports } from 'winston';

export function createLogger(level: string = process.env.LOG_LEVEL || 'info'): Logger {
  const production = process.env.NODE_ENV === 'production';

  return createWinstonLogger({
    level,
    format: production
      ? format.combine(format.timestamp(), format.errors({ stack: true }), format.json())
      : format.combine(format.colorize(), format.timestamp(), format.simple()),
    defaultMeta: { service: 'paper-qa-backend' },
    transports: [new transports.Console()],
  });
}
