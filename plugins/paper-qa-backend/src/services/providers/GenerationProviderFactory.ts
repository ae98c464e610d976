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
 * Resolves provider names to generation backends
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { MissingApiKeyError, UnsupportedProviderError } from '../../errors';
import { IConfigService, IGenerationProvider, ServiceDependencies } from '../../interfaces';
import { isProviderName, PROVIDER_NAMES, ProviderName } from '../../models';
import { BaseGenerationProvider, ProviderOptions } from './BaseGenerationProvider';
import { ClaudeProvider } from './ClaudeProvider';
import { DeepSeekProvider } from './DeepSeekProvider';
import { GeminiProvider } from './GeminiProvider';
import { OllamaProvider } from './OllamaProvider';
import { OpenAIProvider } from './OpenAIProvider';

interface ProviderEntry {
  defaultModel: string;
  requiresApiKey: boolean;
  build(options: ProviderOptions): BaseGenerationProvider;
}

const PROVIDERS: Record<ProviderName, ProviderEntry> = {
  claude: {
    defaultModel: ClaudeProvider.DEFAULT_MODEL,
    requiresApiKey: true,
    build: options => new ClaudeProvider(options),
  },
  openai: {
    defaultModel: OpenAIProvider.DEFAULT_MODEL,
    requiresApiKey: true,
    build: options => new OpenAIProvider(options),
  },
  deepseek: {
    defaultModel: DeepSeekProvider.DEFAULT_MODEL,
    requiresApiKey: true,
    build: options => new DeepSeekProvider(options),
  },
  gemini: {
    defaultModel: GeminiProvider.DEFAULT_MODEL,
    requiresApiKey: true,
    build: options => new GeminiProvider(options),
  },
  ollama: {
    defaultModel: OllamaProvider.DEFAULT_MODEL,
    requiresApiKey: false,
    build: options => new OllamaProvider(options),
  },
};

export interface ProviderOverrides {
  apiKey?: string;
  model?: string;
}

export class GenerationProviderFactory {
  private readonly logger: Logger;
  private readonly configService: IConfigService;

  constructor(dependencies: ServiceDependencies) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
  }

  /**
   * Supported provider names with their default models. Builds nothing.
   */
  static supportedProviders(): Record<ProviderName, string> {
    return {
      claude: PROVIDERS.claude.defaultModel,
      openai: PROVIDERS.openai.defaultModel,
      deepseek: PROVIDERS.deepseek.defaultModel,
      gemini: PROVIDERS.gemini.defaultModel,
      ollama: PROVIDERS.ollama.defaultModel,
    };
  }

  /**
   * Build a provider. Request overrides win over configured keys and models;
   * the configured model applies only to the configured provider.
   */
  create(name: string, overrides: ProviderOverrides = {}): IGenerationProvider {
    if (!isProviderName(name)) {
      throw new UnsupportedProviderError(name, PROVIDER_NAMES);
    }

    const { generation, timeouts, ollamaBaseUrl } = this.configService.getConfig();
    const entry = PROVIDERS[name];
    const apiKey = overrides.apiKey || generation.apiKeys[name];

    if (entry.requiresApiKey && !apiKey) {
      throw new MissingApiKeyError(name);
    }

    const provider = entry.build({
      logger: this.logger,
      timeoutMs: timeouts.generationMs,
      apiKey,
      model: overrides.model || (name === generation.provider ? generation.model : undefined),
      baseUrl: name === 'ollama' ? ollamaBaseUrl : undefined,
    });

    this.logger.debug(`Created ${name} provider with model ${provider.model}`);
    return provider;
  }

  /**
   * The provider named in configuration
   */
  createDefault(): IGenerationProvider {
    return this.create(this.configService.getConfig().generation.provider);
  }
}
