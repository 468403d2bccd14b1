/**
 * Category Generation Service
 * Sends the category prompt to the LLM and parses the reply.
 * Every failure (no provider, transport error, timeout, bad JSON) yields [],
 * which the assembler answers with fallback categories.
 */

import type { LLMProvider } from '../../../llm/types.js';
import { logger } from '../../../lib/logger/structured-logger.js';
import { withTimeout, isTimeoutError } from '../../../lib/reliability/timeout-guard.js';
import { LLM_GENERATION_TEMPERATURE, LLM_GENERATION_TIMEOUT_MS } from '../../../config/index.js';
import type { CategoryDescriptor } from '../types.js';
import { parseCategoryDescriptors } from './category-descriptor.parser.js';

const SYSTEM_PROMPT = 'You generate personalized place categories for a local discovery app. You reply with a JSON array only.';

export class CategoryGenerationService {
  constructor(
    private readonly llm: LLMProvider | null,
    private readonly timeoutMs: number = LLM_GENERATION_TIMEOUT_MS
  ) { }

  async generate(prompt: string, requestId?: string): Promise<CategoryDescriptor[]> {
    if (!this.llm) {
      logger.info({ requestId, event: 'category_generation_skipped', reason: 'llm_not_configured' },
        '[CATEGORIES] No LLM provider configured, skipping generation');
      return [];
    }

    const startTime = Date.now();
    let raw: string;

    try {
      raw = await withTimeout(
        this.llm.complete([
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt }
        ], { temperature: LLM_GENERATION_TEMPERATURE, timeout: this.timeoutMs }),
        this.timeoutMs,
        'category_generation'
      );
    } catch (error) {
      logger.warn({
        requestId,
        event: 'category_generation_failed',
        timedOut: isTimeoutError(error),
        error: error instanceof Error ? error.message : String(error),
        durationMs: Date.now() - startTime
      }, '[CATEGORIES] Generation call failed');
      return [];
    }

    logger.info({
      requestId,
      event: 'category_generation_completed',
      responseLength: raw.length,
      durationMs: Date.now() - startTime
    }, '[CATEGORIES] Generation call completed');

    return parseCategoryDescriptors(raw, requestId);
  }
}
