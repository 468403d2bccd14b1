/**
 * Weather Service
 * One-line current conditions for the generation prompt ("Clouds, 64°F").
 * Missing key, timeout (headers or body), HTTP error or odd payload all give the default line.
 */

import { z } from 'zod';
import { logger } from '../../../lib/logger/structured-logger.js';
import { fetchWithTimeout, readJsonWithinBudget } from '../../../utils/fetch-with-timeout.js';
import { DEFAULT_WEATHER_CONTEXT, WEATHER_TIMEOUT_MS } from '../../../config/index.js';
import type { GeoPoint } from '../types.js';

const OPENWEATHER_URL = 'https://api.openweathermap.org/data/2.5/weather';

const currentWeatherSchema = z.object({
  weather: z.array(z.object({ main: z.string() })).min(1),
  main: z.object({ temp: z.number() })
});

export interface WeatherProvider {
  describe(location: GeoPoint, requestId?: string): Promise<string>;
}

export class WeatherService implements WeatherProvider {
  constructor(
    private readonly apiKey?: string,
    private readonly timeoutMs: number = WEATHER_TIMEOUT_MS
  ) { }

  async describe(location: GeoPoint, requestId?: string): Promise<string> {
    if (!this.apiKey) {
      return DEFAULT_WEATHER_CONTEXT;
    }

    const params = new URLSearchParams({
      lat: String(location.lat),
      lon: String(location.lng),
      appid: this.apiKey,
      units: 'imperial'
    });

    const startTime = Date.now();

    try {
      const response = await fetchWithTimeout(`${OPENWEATHER_URL}?${params.toString()}`, { method: 'GET' }, {
        timeoutMs: this.timeoutMs,
        requestId,
        stage: 'weather',
        provider: 'openweather'
      });

      if (!response.ok) {
        logger.warn({ requestId, event: 'weather_http_error', status: response.status }, '[WEATHER] Non-OK response, using default');
        return DEFAULT_WEATHER_CONTEXT;
      }

      const body = await readJsonWithinBudget(response, startTime, this.timeoutMs, 'weather_body');
      const parsed = currentWeatherSchema.safeParse(body);
      if (!parsed.success) {
        logger.warn({ requestId, event: 'weather_bad_payload' }, '[WEATHER] Unexpected payload, using default');
        return DEFAULT_WEATHER_CONTEXT;
      }

      const [condition] = parsed.data.weather;
      return `${condition?.main ?? 'Clear'}, ${Math.trunc(parsed.data.main.temp)}°F`;
    } catch (error) {
      logger.warn({
        requestId,
        event: 'weather_fetch_failed',
        error: error instanceof Error ? error.message : String(error)
      }, '[WEATHER] Lookup failed, using default');
      return DEFAULT_WEATHER_CONTEXT;
    }
  }
}
