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
 * Builds the configuration reader from an optional JSON file and the
 * process environment. Environment values win over the file.
 *
 * @packageDocumentation
 */

import * as fs from 'fs';
import { AppConfig, ConfigReader } from '@backstage/config';
import { ConfigurationError, describeError } from '../errors';

type ConfigData = AppConfig['data'];
type ValueKind = 'string' | 'number' | 'boolean';

/**
 * Environment variable → dotted config path under `paperQa`
 */
const ENV_MAPPINGS: ReadonlyArray<[string, string, ValueKind]> = [
  ['MAX_PAPERS', 'maxPapers', 'number'],
  ['CHUNK_SIZE', 'chunkSize', 'number'],
  ['CHUNK_OVERLAP', 'chunkOverlap', 'number'],
  ['MIN_CHUNK_CHARS', 'minChunkChars', 'number'],
  ['DOWNLOAD_DIR', 'downloadDir', 'string'],
  ['COLLECTION_NAME', 'collectionName', 'string'],
  ['EMBEDDING_MODEL', 'embeddingModel', 'string'],
  ['OLLAMA_BASE_URL', 'ollamaBaseUrl', 'string'],
  ['LLM_PROVIDER', 'generation.provider', 'string'],
  ['LLM_MODEL', 'generation.model', 'string'],
  ['MAX_TOKENS', 'generation.maxTokens', 'number'],
  ['ANTHROPIC_API_KEY', 'generation.apiKeys.claude', 'string'],
  ['OPENAI_API_KEY', 'generation.apiKeys.openai', 'string'],
  ['DEEPSEEK_API_KEY', 'generation.apiKeys.deepseek', 'string'],
  ['GEMINI_API_KEY', 'generation.apiKeys.gemini', 'string'],
  ['MAX_PDF_BYTES', 'limits.maxPdfBytes', 'number'],
  ['MAX_PAGES', 'limits.maxPages', 'number'],
  ['STRICT_PAGE_LIMIT', 'limits.strictPageLimit', 'boolean'],
  ['INGEST_CONCURRENCY', 'limits.ingestConcurrency', 'number'],
  ['SOURCE_MIN_INTERVAL_MS', 'source.minRequestIntervalMs', 'number'],
  ['VECTOR_STORE_TYPE', 'vectorStore.type', 'string'],
  ['VECTOR_STORE_FALLBACK', 'vectorStore.fallbackToMemory', 'boolean'],
  ['POSTGRES_HOST', 'vectorStore.postgresql.host', 'string'],
  ['POSTGRES_PORT', 'vectorStore.postgresql.port', 'number'],
  ['POSTGRES_DB', 'vectorStore.postgresql.database', 'string'],
  ['POSTGRES_USER', 'vectorStore.postgresql.user', 'string'],
  ['POSTGRES_PASSWORD', 'vectorStore.postgresql.password', 'string'],
  ['POSTGRES_SSL', 'vectorStore.postgresql.ssl', 'boolean'],
];

function convert(name: string, raw: string, kind: ValueKind): string | number | boolean {
  switch (kind) {
    case 'number': {
      const value = Number(raw);
      if (!Number.isFinite(value)) {
        throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
      }
      return value;
    }
    case 'boolean':
      return raw.toLowerCase() === 'true';
    default:
      return raw;
  }
}

function setPath(target: ConfigData, path: string[], value: string | number | boolean): void {
  let node = target;
  for (const key of path.slice(0, -1)) {
    const next = node[key];
    if (next && typeof next === 'object' && !Array.isArray(next)) {
      node = next;
    } else {
      const created: ConfigData = {};
      node[key] = created;
      node = created;
    }
  }
  node[path[path.length - 1]] = value;
}

function readConfigFile(filePath: string): ConfigData {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Could not read config file ${filePath}: ${describeError(error)}`);
  }
  if (!isConfigObject(parsed)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a JSON object`);
  }
  return parsed;
}

function isConfigObject(value: unknown): value is ConfigData {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Environment overrides as a config object rooted at `paperQa`
 */
export function configFromEnv(env: NodeJS.ProcessEnv): ConfigData {
  const data: ConfigData = {};
  for (const [name, path, kind] of ENV_MAPPINGS) {
    const raw = env[name]?.trim();
    if (raw) {
      setPath(data, ['paperQa', ...path.split('.')], convert(name, raw, kind));
    }
  }
  return data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ConfigReader {
  const configs: AppConfig[] = [];
  const filePath = env.PAPER_QA_CONFIG_FILE?.trim();
  if (filePath) {
    configs.push({ context: filePath, data: readConfigFile(filePath) });
  }
  configs.push({ context: 'env', data: configFromEnv(env) });

  // fromConfigs gives the last entry the highest priority
  return ConfigReader.fromConfigs(configs);
}
