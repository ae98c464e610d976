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
 * On-disk cache of downloaded paper bytes
 *
 * @packageDocumentation
 */

import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import * as path from 'path';
import type { Logger } from 'winston';
import { ContractViolationError } from '../errors';
import { IPaperCache } from '../interfaces';
import { PaperHandle } from '../models';

const MAX_TITLE_LENGTH = 100;

/**
 * Title reduced to letters, digits, spaces, `-` and `_`
 */
export function sanitizeTitle(title: string): string {
  const safe = title
    .replace(/[^\p{L}\p{N} _-]/gu, '')
    .trim()
    .slice(0, MAX_TITLE_LENGTH)
    .trim();
  return safe || 'paper';
}

export function idDigest(paperId: string): string {
  return createHash('sha256').update(paperId).digest('hex').slice(0, 8);
}

/**
 * Files are named `<sanitized title>-<id digest>.pdf` so that papers with
 * colliding titles never share a file
 */
export class PaperCache implements IPaperCache {
  private readonly root: string;

  constructor(
    root: string,
    private readonly logger: Logger,
  ) {
    this.root = path.resolve(root);
  }

  pathFor(handle: PaperHandle): string {
    const fileName = `${sanitizeTitle(handle.title)}-${idDigest(handle.paperId)}.pdf`;
    const resolved = path.resolve(this.root, fileName);
    const relative = path.relative(this.root, resolved);

    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new ContractViolationError(`Refusing cache path outside ${this.root}`, { paperId: handle.paperId });
    }
    return resolved;
  }

  async read(handle: PaperHandle): Promise<Buffer | null> {
    const filePath = this.pathFor(handle);
    try {
      const content = await fs.readFile(filePath);
      this.logger.debug(`Cache hit for ${handle.paperId}: ${filePath}`);
      return content;
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  async write(handle: PaperHandle, content: Buffer): Promise<string> {
    const filePath = this.pathFor(handle);
    const tempPath = `${filePath}.${process.pid}.tmp`;

    await fs.mkdir(this.root, { recursive: true });
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, filePath);

    this.logger.debug(`Cached ${content.length} bytes for ${handle.paperId} at ${filePath}`);
    return filePath;
  }
}

/**
 * fs errors may come from another realm, so match on shape
 */
function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
