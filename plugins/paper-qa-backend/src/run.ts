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
 * Standalone server entry point
 *
 * @packageDocumentation
 */

import 'dotenv/config';
import express from 'express';
import type { Logger } from 'winston';
import { loadConfig } from './config/loadConfig';
import { describeError } from './errors';
import { createLogger } from './logger';
import { createPaperQaRouter } from './router';
import { PaperQaService } from './services/PaperQaService';

const DEFAULT_PORT = 7007;

async function main(logger: Logger): Promise<void> {
  const service = await PaperQaService.create({ logger, config: loadConfig() });

  const app = express();
  app.use('/api', createPaperQaRouter({ logger, service }));

  const port = Number(process.env.PORT) || DEFAULT_PORT;
  const server = app.listen(port, () => {
    logger.info(`Paper QA backend listening on port ${port}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close(() => {
      service
        .close()
        .then(() => process.exit(0))
        .catch(error => {
          logger.error(`Shutdown failed: ${describeError(error)}`);
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

const logger = createLogger();

main(logger).catch(error => {
  logger.error(`Failed to start paper QA backend: ${describeError(error)}`);
  process.exit(1);
});
