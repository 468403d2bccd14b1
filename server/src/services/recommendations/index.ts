/**
 * Wiring for the recommendation pipeline.
 * STORE_MODE picks in-memory or Redis storage; everything else is
 * constructor-injected so tests can swap any piece.
 */

import type { Redis as RedisClient } from 'ioredis';
import type { AppConfig } from '../../config/env.js';
import { logger } from '../../lib/logger/structured-logger.js';
import { IoRedisCommandRunner } from '../../lib/redis/redis-command-runner.js';
import { createLLMProvider } from '../../llm/factory.js';
import { RecommendationService } from './recommendation.service.js';
import { CategoryAssembler } from './assembly/category-assembler.js';
import { CategoryGenerationService } from './generation/category-generation.service.js';
import { FingerprintReader } from './fingerprint/fingerprint-reader.js';
import type { FingerprintStore } from './fingerprint/fingerprint-store.interface.js';
import { InMemoryFingerprintStore } from './fingerprint/inmemory-fingerprint.store.js';
import { RedisFingerprintStore } from './fingerprint/redis-fingerprint.store.js';
import { InteractionRecorder } from './fingerprint/interaction-recorder.js';
import { GooglePlacesClient } from './places/google-places.client.js';
import { PlaceSearchAdapter } from './places/place-search.adapter.js';
import { InMemoryPreferenceStore, RedisPreferenceStore, type PreferenceStore } from './preferences/preference-store.js';
import { WeatherService } from './weather/weather.service.js';

export interface AppServices {
  recommendations: RecommendationService;
  recorder: InteractionRecorder;
  fingerprints: FingerprintStore;
  preferences: PreferenceStore;
}

export function createAppServices(config: AppConfig, redis: RedisClient | null): AppServices {
  let fingerprints: FingerprintStore;
  let preferences: PreferenceStore;

  if (redis) {
    const runner = new IoRedisCommandRunner(redis);
    fingerprints = new RedisFingerprintStore(runner);
    preferences = new RedisPreferenceStore(runner);
  } else {
    if (config.storeMode === 'redis') {
      logger.warn({ event: 'store_mode_degraded' }, '[Services] Redis unavailable, falling back to in-memory stores');
    }
    fingerprints = new InMemoryFingerprintStore();
    preferences = new InMemoryPreferenceStore();
  }

  const llm = createLLMProvider(config);
  if (!llm) {
    logger.warn({ event: 'llm_disabled', provider: config.llmProvider }, '[Services] No LLM provider, every cycle will use fallback categories');
  }

  const placeSearch = new PlaceSearchAdapter(new GooglePlacesClient(config.googleApiKey));

  const recommendations = new RecommendationService({
    fingerprints: new FingerprintReader(fingerprints),
    preferences,
    weather: new WeatherService(config.openWeatherApiKey),
    generator: new CategoryGenerationService(llm),
    assembler: new CategoryAssembler(placeSearch),
    morePlaces: placeSearch
  });

  return {
    recommendations,
    recorder: new InteractionRecorder(fingerprints),
    fingerprints,
    preferences
  };
}
