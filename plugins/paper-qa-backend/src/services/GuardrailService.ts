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
 * Rule-based guardrails for questions and generated answers.
 *
 * The keyword and overlap heuristics are deliberately simple and have known
 * false positives and negatives. They screen for scope and grounding; they
 * are not a security boundary.
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { z } from 'zod';
import rawRules from '../data/guardrail-rules.json';
import { ConfigurationError } from '../errors';
import { IGuardrailService } from '../interfaces';
import { GuardrailVerdict, ViolationKind } from '../models';

const GuardrailRulesSchema = z.object({
  harmfulKeywords: z.array(z.string().min(1)),
  researchKeywords: z.array(z.string().min(1)),
  offTopicPatterns: z.array(z.string().min(1)),
  jailbreakPatterns: z.array(z.string().min(1)),
  stopWords: z.array(z.string()),
  messages: z.object({
    harmful: z.string(),
    off_topic: z.string(),
    jailbreak: z.string(),
    hallucination: z.string(),
    not_grounded: z.string(),
  }),
  thresholds: z.object({
    minInputWords: z.number().int().positive(),
    researchRequiredFromWords: z.number().int().positive(),
    maxUnsupportedNumbers: z.number().int().nonnegative(),
    groundedOverlap: z.number().int().nonnegative(),
    shortResponseWords: z.number().int().positive(),
    shortResponseOverlap: z.number().int().nonnegative(),
  }),
});

export type GuardrailRules = z.infer<typeof GuardrailRulesSchema>;

export interface GuardrailStats {
  inputRails: string[];
  outputRails: string[];
}

const NUMBER_PATTERN = /\b\d+(?:\.\d+)?%?/g;

const SAFE: GuardrailVerdict = { isSafe: true, kind: null, message: null };

/**
 * Parse a rule set, failing on a malformed one
 */
export function parseGuardrailRules(data: unknown): GuardrailRules {
  const result = GuardrailRulesSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(`Invalid guardrail rules: ${result.error.message}`);
  }
  return result.data;
}

/** Rules shipped with the package */
export const DEFAULT_GUARDRAIL_RULES: GuardrailRules = parseGuardrailRules(rawRules);

function words(text: string): string[] {
  return text.split(/\s+/).filter(word => word.length > 0);
}

function numbers(text: string): Set<string> {
  return new Set(text.match(NUMBER_PATTERN) ?? []);
}

export class GuardrailService implements IGuardrailService {
  private readonly stopWords: Set<string>;

  constructor(
    private readonly logger: Logger,
    private readonly rules: GuardrailRules = DEFAULT_GUARDRAIL_RULES,
  ) {
    this.stopWords = new Set(rules.stopWords);
  }

  /**
   * Screen a question. First match wins: harmful, off-topic, jailbreak.
   */
  checkInput(text: string): GuardrailVerdict {
    const lower = text.toLowerCase();
    this.logger.debug(`Checking input: ${text.slice(0, 50)}`);

    const harmful = this.rules.harmfulKeywords.filter(keyword => lower.includes(keyword));
    if (harmful.length > 0) {
      this.logger.warn(`Harmful keywords found: ${harmful.join(', ')}`);
      return this.violation('harmful');
    }

    if (this.isOffTopic(lower)) {
      this.logger.warn(`Off-topic query detected: ${text.slice(0, 50)}`);
      return this.violation('off_topic');
    }

    if (this.rules.jailbreakPatterns.some(pattern => lower.includes(pattern))) {
      this.logger.warn(`Jailbreak attempt detected: ${text.slice(0, 50)}`);
      return this.violation('jailbreak');
    }

    return SAFE;
  }

  /**
   * Screen a generated answer against the context it was generated from.
   * Verdicts here are advisory.
   */
  checkOutput(response: string, retrievedContext: string[], question: string): GuardrailVerdict {
    this.logger.debug(`Checking answer grounding for: ${question.slice(0, 50)}`);

    if (this.hasUnsupportedNumbers(response, retrievedContext)) {
      this.logger.warn('Potential hallucination detected');
      return this.violation('hallucination');
    }

    if (!this.isGrounded(response, retrievedContext)) {
      this.logger.warn('Response may not be well grounded');
      return this.violation('not_grounded');
    }

    return SAFE;
  }

  getStats(): GuardrailStats {
    return {
      inputRails: ['check harmful content', 'check off topic', 'check jailbreak attempts'],
      outputRails: ['check hallucination', 'check factual grounding'],
    };
  }

  private isOffTopic(lower: string): boolean {
    if (this.rules.offTopicPatterns.some(pattern => lower.includes(pattern))) {
      return true;
    }

    const wordCount = words(lower).length;
    const hasResearchContext = this.rules.researchKeywords.some(keyword => lower.includes(keyword));
    const { minInputWords, researchRequiredFromWords } = this.rules.thresholds;

    // Inputs between the two bounds pass without a research keyword
    if (wordCount < minInputWords || wordCount >= researchRequiredFromWords) {
      return !hasResearchContext;
    }
    return false;
  }

  private hasUnsupportedNumbers(response: string, context: string[]): boolean {
    if (context.length === 0) {
      return false;
    }
    const known = numbers(context.join(' ').toLowerCase());
    const unsupported = [...numbers(response)].filter(token => !known.has(token));
    return unsupported.length > this.rules.thresholds.maxUnsupportedNumbers;
  }

  private isGrounded(response: string, context: string[]): boolean {
    if (context.length === 0) {
      return false;
    }

    const responseWords = words(response.toLowerCase());
    const contextWords = new Set(words(context.join(' ').toLowerCase()));
    const overlap = new Set(
      responseWords.filter(word => contextWords.has(word) && !this.stopWords.has(word)),
    ).size;

    const { groundedOverlap, shortResponseWords, shortResponseOverlap } = this.rules.thresholds;
    return (
      overlap > groundedOverlap || (responseWords.length < shortResponseWords && overlap > shortResponseOverlap)
    );
  }

  private violation(kind: ViolationKind): GuardrailVerdict {
    return { isSafe: false, kind, message: this.rules.messages[kind] };
  }
}
