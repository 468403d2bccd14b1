/**
 * Pure application of a FingerprintUpdate to a fingerprint snapshot.
 * The in-memory store uses it directly; the Redis store mirrors it command by command.
 */

import { INTERACTION_LOG_LIMIT } from '../../../config/index.js';
import type { UserFingerprint } from '../types.js';
import type { FingerprintUpdate } from './fingerprint-store.interface.js';

function addMember(list: readonly string[], member: string | undefined): string[] {
  if (member === undefined || list.includes(member)) return [...list];
  return [...list, member];
}

function removeMember(list: readonly string[], member: string | undefined): string[] {
  return member === undefined ? [...list] : list.filter(item => item !== member);
}

export function applyFingerprintUpdate(fingerprint: UserFingerprint, update: FingerprintUpdate): UserFingerprint {
  const tagAffinities = { ...fingerprint.tagAffinities };
  for (const [tag, delta] of Object.entries(update.tagDeltas)) {
    tagAffinities[tag] = (tagAffinities[tag] ?? 0) + delta;
  }

  return {
    ...fingerprint,
    likes: removeMember(addMember(fingerprint.likes, update.addLike), update.removeLike),
    dislikes: removeMember(addMember(fingerprint.dislikes, update.addDislike), update.removeDislike),
    likeCount: fingerprint.likeCount + update.likeCountDelta,
    dislikeCount: fingerprint.dislikeCount + update.dislikeCountDelta,
    tagAffinities,
    interactionLogs: [update.log, ...fingerprint.interactionLogs].slice(0, INTERACTION_LOG_LIMIT),
    behavior: {
      totalPlaceViews: fingerprint.behavior.totalPlaceViews + update.behaviorDeltas.totalPlaceViews,
      totalThumbsUp: fingerprint.behavior.totalThumbsUp + update.behaviorDeltas.totalThumbsUp,
      totalThumbsDown: fingerprint.behavior.totalThumbsDown + update.behaviorDeltas.totalThumbsDown
    },
    lastInteractionTime: update.timestamp
  };
}
