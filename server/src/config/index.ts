/**
 * Centralized configuration for the server.
 * Model names, timeouts, and the magic numbers of the recommendation pipeline.
 */

// === LLM Provider Settings ===

/** The default LLM model to use for completions. */
export const DEFAULT_LLM_MODEL = process.env.OPENAI_MODEL || 'gpt-4o-mini';

/** Timeout (ms) for a category generation completion. */
export const LLM_GENERATION_TIMEOUT_MS = 30_000;

/** Sampling temperature for category generation; some variety between cycles is wanted. */
export const LLM_GENERATION_TEMPERATURE = 0.7;

// === Places Search ===

/** Timeout (ms) for a single places text search call. */
export const PLACES_SEARCH_TIMEOUT_MS = 15_000;

/** Search radius used when the user never picked one. */
export const DEFAULT_SEARCH_RADIUS_MILES = 2.0;

export const METERS_PER_MILE = 1609.34;

/** Max places returned by one "load more" request. */
export const MORE_PLACES_PAGE_SIZE = 10;

/** Users whose latest feed and cycle number stay in memory; least recently active go first. */
export const MAX_TRACKED_USERS = 10_000;

// === Weather ===

export const WEATHER_TIMEOUT_MS = 5_000;

/** Weather line used in prompts when the weather service is unavailable. */
export const DEFAULT_WEATHER_CONTEXT = 'Clear, 72°F';

// === Category Assembly ===

/** Number of categories requested from the generator. */
export const REQUESTED_CATEGORY_COUNT = 12;

/** Below this many non-empty categories, the fallback templates are used. */
export const MIN_CATEGORY_COUNT = 3;

// === Fingerprint ===

/** Interaction log entries kept per user (most recent). */
export const INTERACTION_LOG_LIMIT = 100;
