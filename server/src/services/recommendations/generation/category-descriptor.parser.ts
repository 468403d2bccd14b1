/**
 * Category Descriptor Parser
 *
 * Raw generator text -> CategoryDescriptor[].
 * - Top level must be a JSON array; anything else yields [] (not an error).
 * - Items missing a required string field are dropped and logged.
 * - Unknown category names fall back to "restaurants".
 * - A repeated id keeps its first occurrence only.
 * - Optional fields that are absent or mistyped take fixed defaults.
 */

import { z } from 'zod';
import { logger } from '../../../lib/logger/structured-logger.js';
import type { CategoryDescriptor, PlaceCategory } from '../types.js';

export const DEFAULT_CONFIDENCE = 0.8;
export const DEFAULT_EMOJI = '📍';
export const DEFAULT_VIBE = 'Great local spot';

const CATEGORY_ALIASES: Record<string, PlaceCategory> = {
  restaurant: 'restaurants',
  restaurants: 'restaurants',
  cafe: 'cafes',
  cafes: 'cafes',
  bar: 'bars',
  bars: 'bars',
  venue: 'venues',
  venues: 'venues',
  shopping: 'shopping'
};

const descriptorItemSchema = z.object({
  id: z.string(),
  title: z.string(),
  subtitle: z.string(),
  reasoning: z.string(),
  searchQuery: z.string(),
  category: z.string(),
  confidence: z.number().finite().optional().catch(undefined),
  personalizedEmoji: z.string().optional().catch(undefined),
  vibeDescription: z.string().optional().catch(undefined),
  socialProofText: z.string().optional().catch(undefined),
  psychologyHook: z.string().optional().catch(undefined)
});

export function resolveCategory(raw: string): PlaceCategory | null {
  return CATEGORY_ALIASES[raw.trim().toLowerCase()] ?? null;
}

function clampConfidence(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/** Strip a surrounding ``` / ```json fence if the generator added one anyway. */
function unfence(text: string): string {
  const trimmed = text.trim();
  const fence = trimmed.match(/^```(?:json)?\s*\n?([\s\S]*?)\n?```$/i);
  return fence?.[1]?.trim() ?? trimmed;
}

function parseTopLevelArray(text: string): unknown[] | null {
  try {
    const parsed: unknown = JSON.parse(unfence(text));
    return Array.isArray(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function parseCategoryDescriptors(raw: string, requestId?: string): CategoryDescriptor[] {
  const items = parseTopLevelArray(raw);
  if (!items) {
    logger.warn({
      requestId,
      event: 'category_generation_unparseable',
      responseLength: raw.length
    }, '[CATEGORIES] Generator response is not a JSON array');
    return [];
  }

  const descriptors: CategoryDescriptor[] = [];
  const seenIds = new Set<string>();

  items.forEach((item, index) => {
    const parsed = descriptorItemSchema.safeParse(item);
    if (!parsed.success) {
      logger.warn({
        requestId,
        event: 'category_item_dropped',
        index,
        issues: parsed.error.issues.map(issue => issue.path.join('.'))
      }, '[CATEGORIES] Dropping category with missing required fields');
      return;
    }

    const data = parsed.data;
    if (seenIds.has(data.id)) {
      logger.warn({
        requestId,
        event: 'category_duplicate_id',
        index,
        id: data.id
      }, '[CATEGORIES] Dropping category with a repeated id');
      return;
    }
    seenIds.add(data.id);

    let category = resolveCategory(data.category);
    if (!category) {
      logger.warn({
        requestId,
        event: 'category_unknown_kind',
        id: data.id,
        category: data.category
      }, '[CATEGORIES] Unknown category kind, defaulting to restaurants');
      category = 'restaurants';
    }

    descriptors.push({
      id: data.id,
      title: data.title,
      subtitle: data.subtitle,
      reasoning: data.reasoning,
      searchQuery: data.searchQuery,
      category,
      confidence: data.confidence === undefined ? DEFAULT_CONFIDENCE : clampConfidence(data.confidence),
      personalizedEmoji: data.personalizedEmoji ?? DEFAULT_EMOJI,
      vibeDescription: data.vibeDescription ?? DEFAULT_VIBE,
      socialProofText: data.socialProofText,
      psychologyHook: data.psychologyHook,
      places: []
    });
  });

  logger.info({
    requestId,
    event: 'category_generation_parsed',
    received: items.length,
    kept: descriptors.length
  }, '[CATEGORIES] Parsed generated categories');

  return descriptors;
}
