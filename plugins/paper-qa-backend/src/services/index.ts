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
 * Service exports
 *
 * @packageDocumentation
 */

export { ConfigService } from './ConfigService';
export { DocumentProcessor } from './DocumentProcessor';
export { DocumentStore } from './DocumentStore';
export { OllamaEmbeddingService } from './OllamaEmbeddingService';
export { InMemoryVectorStore } from './InMemoryVectorStore';
export { PgVectorStore } from './PgVectorStore';
export { VectorStoreFactory } from './VectorStoreFactory';
export { InMemoryPaperRegistry } from './InMemoryPaperRegistry';
export { PaperCache } from './PaperCache';
export { ArxivPaperSource } from './ArxivPaperSource';
export { PdfTextExtractor } from './PdfTextExtractor';
export { IngestionPipeline } from './IngestionPipeline';
export { GuardrailService, DEFAULT_GUARDRAIL_RULES, parseGuardrailRules } from './GuardrailService';
export type { GuardrailRules, GuardrailStats } from './GuardrailService';
export { PaperQaService } from './PaperQaService';
export type { PaperQaStats, QuestionOptions } from './PaperQaService';
export { GenerationProviderFactory } from './providers/GenerationProviderFactory';
export { BaseGenerationProvider } from './providers/BaseGenerationProvider';
export { ClaudeProvider } from './providers/ClaudeProvider';
export { OpenAIProvider } from './providers/OpenAIProvider';
export { DeepSeekProvider } from './providers/DeepSeekProvider';
export { GeminiProvider } from './providers/GeminiProvider';
export { OllamaProvider } from './providers/OllamaProvider';
