/**
 * Google Places Text Search client (Places API New)
 *
 * One call = one free-text query biased to a circle around the user.
 * The API treats the circle as a bias, not a restriction; callers must
 * re-check distances themselves.
 */

import { z } from 'zod';
import { logger } from '../../../lib/logger/structured-logger.js';
import { fetchWithTimeout, readJsonWithinBudget, UpstreamFetchError, type FetchErrorKind } from '../../../utils/fetch-with-timeout.js';
import { isTimeoutError } from '../../../lib/reliability/timeout-guard.js';
import { PLACES_SEARCH_TIMEOUT_MS } from '../../../config/index.js';
import type { GeoPoint } from '../types.js';

const TEXT_SEARCH_URL = 'https://places.googleapis.com/v1/places:searchText';

const PLACES_FIELD_MASK = 'places.id,places.displayName,places.formattedAddress,places.location,places.rating,places.userRatingCount,places.priceLevel,places.currentOpeningHours,places.photos,places.types';

/** locationBias.circle.radius upper bound accepted by the API */
const MAX_BIAS_RADIUS_METERS = 50_000;

const MAX_RESULT_COUNT = 20;

const textSearchResponseSchema = z.object({
  places: z.array(z.unknown()).optional()
});

export interface TextSearchRequest {
  query: string;
  location: GeoPoint;
  radiusMeters: number;
  requestId?: string;
}

export type PlacesSearchFailure = FetchErrorKind | 'NOT_CONFIGURED' | 'EMPTY_QUERY' | 'HTTP_ERROR' | 'BAD_RESPONSE';

/** Raw results stay untyped here; conversion happens per item in the result mapper. */
export type PlacesSearchOutcome =
  | { ok: true; results: unknown[] }
  | { ok: false; reason: PlacesSearchFailure; status?: number };

export interface PlacesSearchClient {
  searchText(request: TextSearchRequest): Promise<PlacesSearchOutcome>;
}

export class GooglePlacesClient implements PlacesSearchClient {
  constructor(
    private readonly apiKey: string | undefined,
    private readonly timeoutMs: number = PLACES_SEARCH_TIMEOUT_MS
  ) { }

  async searchText(request: TextSearchRequest): Promise<PlacesSearchOutcome> {
    const { requestId } = request;
    const query = request.query.trim();

    if (!this.apiKey) {
      logger.error({
        requestId,
        provider: 'google_places_new',
        method: 'searchText',
        error: 'GOOGLE_API_KEY not configured'
      }, '[GOOGLE] API key missing');
      return { ok: false, reason: 'NOT_CONFIGURED' };
    }

    if (!query) {
      return { ok: false, reason: 'EMPTY_QUERY' };
    }

    const body = {
      textQuery: query,
      maxResultCount: MAX_RESULT_COUNT,
      locationBias: {
        circle: {
          center: { latitude: request.location.lat, longitude: request.location.lng },
          radius: Math.min(request.radiusMeters, MAX_BIAS_RADIUS_METERS)
        }
      }
    };

    const startTime = Date.now();

    try {
      const response = await fetchWithTimeout(TEXT_SEARCH_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'X-Goog-Api-Key': this.apiKey,
          'X-Goog-FieldMask': PLACES_FIELD_MASK
        },
        body: JSON.stringify(body)
      }, {
        timeoutMs: this.timeoutMs,
        requestId,
        stage: 'places_text_search',
        provider: 'google_places'
      });

      if (!response.ok) {
        logger.warn({
          requestId,
          provider: 'google_places_new',
          method: 'searchText',
          status: response.status,
          durationMs: Date.now() - startTime
        }, '[GOOGLE] Text Search returned error status');
        return { ok: false, reason: 'HTTP_ERROR', status: response.status };
      }

      const responseBody = await readJsonWithinBudget(response, startTime, this.timeoutMs, 'places_text_search_body');
      const parsed = textSearchResponseSchema.safeParse(responseBody);
      if (!parsed.success) {
        logger.warn({ requestId, event: 'places_bad_response' }, '[GOOGLE] Unexpected Text Search payload');
        return { ok: false, reason: 'BAD_RESPONSE' };
      }

      const results = parsed.data.places ?? [];
      logger.info({
        requestId,
        provider: 'google_places_new',
        method: 'searchText',
        textQuery: query,
        radiusMeters: body.locationBias.circle.radius,
        resultCount: results.length,
        durationMs: Date.now() - startTime
      }, '[GOOGLE] Text Search completed');

      return { ok: true, results };
    } catch (error) {
      if (error instanceof UpstreamFetchError) {
        return { ok: false, reason: error.errorKind };
      }
      if (isTimeoutError(error)) {
        logger.warn({
          requestId,
          event: 'places_body_timeout',
          timeoutMs: this.timeoutMs,
          durationMs: Date.now() - startTime
        }, '[GOOGLE] Text Search body did not arrive in time');
        return { ok: false, reason: 'TIMEOUT' };
      }
      // response.json() on a truncated body
      logger.warn({
        requestId,
        event: 'places_decode_failed',
        error: error instanceof Error ? error.message : String(error)
      }, '[GOOGLE] Failed to decode Text Search response');
      return { ok: false, reason: 'BAD_RESPONSE' };
    }
  }
}
