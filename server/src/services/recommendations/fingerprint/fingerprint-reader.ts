/**
 * Fingerprint Reader
 * Read-only access for the generation cycle. A store failure is logged and
 * reads as "no fingerprint", which the pipeline already handles.
 */

import { logger } from '../../../lib/logger/structured-logger.js';
import type { UserFingerprint } from '../types.js';
import type { FingerprintStore } from './fingerprint-store.interface.js';

export class FingerprintReader {
  constructor(private readonly store: FingerprintStore) { }

  async read(userId: string, requestId?: string): Promise<UserFingerprint | null> {
    try {
      const fingerprint = await this.store.get(userId);
      logger.debug({
        requestId,
        userId,
        event: 'fingerprint_read',
        found: fingerprint !== null
      }, '[FINGERPRINT] Read fingerprint');
      return fingerprint;
    } catch (error) {
      logger.warn({
        requestId,
        userId,
        event: 'fingerprint_read_failed',
        error: error instanceof Error ? error.message : String(error)
      }, '[FINGERPRINT] Read failed, continuing without fingerprint');
      return null;
    }
  }
}
