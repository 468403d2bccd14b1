/**
 * Interaction Recorder
 *
 * Turns one user reaction to a place into an incremental fingerprint update:
 *
 *   interaction                   likes / dislikes             counters              tags
 *   liked                         +likes, -dislikes            likeCount+1, thumbsUp  +1 each
 *   disliked                      +dislikes, -likes            dislikeCount+1, thumbsDown
 *   bookmarked                    +likes                       likeCount+1
 *   shared, visited, reviewed                                                        +1 each
 *   viewed, called, navigated,
 *   photographed, recommended     (no preference change)
 *
 * Every interaction appends a log entry, bumps totalPlaceViews and sets lastInteractionTime.
 */

import { logger } from '../../../lib/logger/structured-logger.js';
import type { GeoPoint, InteractionLogEntry, Place, PlaceInteraction } from '../types.js';
import type { FingerprintStore, FingerprintUpdate } from './fingerprint-store.interface.js';

export interface InteractionEvent {
  userId: string;
  place: Place;
  interaction: PlaceInteraction;
  /** Where the user was; logged as 0,0 when unknown */
  location?: GeoPoint;
}

const TAG_AFFINITY_INTERACTIONS: ReadonlySet<PlaceInteraction> = new Set(['liked', 'shared', 'visited', 'reviewed']);

export function buildFingerprintUpdate(
  place: Place,
  interaction: PlaceInteraction,
  now: Date,
  location?: GeoPoint
): FingerprintUpdate {
  const timestamp = now.toISOString();

  const log: InteractionLogEntry = {
    placeId: place.googlePlaceId ?? place.id,
    placeName: place.name,
    category: place.category,
    interaction,
    timestamp,
    location: { latitude: location?.lat ?? 0, longitude: location?.lng ?? 0 },
    rating: place.rating,
    priceRange: place.priceRange
  };

  const update: FingerprintUpdate = {
    likeCountDelta: 0,
    dislikeCountDelta: 0,
    tagDeltas: {},
    behaviorDeltas: { totalPlaceViews: 1, totalThumbsUp: 0, totalThumbsDown: 0 },
    log,
    timestamp
  };

  switch (interaction) {
    case 'liked':
      update.addLike = place.name;
      update.removeDislike = place.name;
      update.likeCountDelta = 1;
      update.behaviorDeltas.totalThumbsUp = 1;
      break;
    case 'disliked':
      update.addDislike = place.name;
      update.removeLike = place.name;
      update.dislikeCountDelta = 1;
      update.behaviorDeltas.totalThumbsDown = 1;
      break;
    case 'bookmarked':
      update.addLike = place.name;
      update.likeCountDelta = 1;
      break;
    default:
      break;
  }

  if (TAG_AFFINITY_INTERACTIONS.has(interaction)) {
    for (const tag of new Set(place.descriptiveTags)) {
      update.tagDeltas[tag] = 1;
    }
  }

  return update;
}

export class InteractionRecorder {
  constructor(
    private readonly store: FingerprintStore,
    private readonly clock: () => Date = () => new Date()
  ) { }

  /**
   * Resolves to whether the update was stored. Never rejects.
   */
  async record(event: InteractionEvent, requestId?: string): Promise<boolean> {
    const update = buildFingerprintUpdate(event.place, event.interaction, this.clock(), event.location);

    try {
      await this.store.applyUpdate(event.userId, update);
    } catch (error) {
      logger.error({
        requestId,
        userId: event.userId,
        event: 'interaction_record_failed',
        interaction: event.interaction,
        placeName: event.place.name,
        error: error instanceof Error ? error.message : String(error)
      }, '[INTERACTIONS] Failed to record interaction');
      return false;
    }

    logger.info({
      requestId,
      userId: event.userId,
      event: 'interaction_recorded',
      interaction: event.interaction,
      placeName: event.place.name,
      tagDeltas: Object.keys(update.tagDeltas).length
    }, '[INTERACTIONS] Interaction recorded');

    return true;
  }
}
