/**
 * Artist Reconciler
 *
 * Splits extracted names into artists already in the registry and new ones.
 * Without a registry, or when the registry cannot be reached, every name is new.
 */

import type { ArtistRepository } from '../storage/ArtistRepository.js';
import type { ArtistRecord, ReconciliationResult } from './types.js';
import { logger } from '../utils/logger.js';

export class ArtistReconciler {
  constructor(private readonly repository: ArtistRepository | null) {}

  async reconcile(names: readonly string[]): Promise<ReconciliationResult> {
    if (!this.repository || names.length === 0) {
      return { existing: [], new: [...names] };
    }

    let records: ArtistRecord[];
    try {
      records = await this.repository.findByNames(names);
    } catch (error) {
      logger.warn('Artist registry unavailable, treating all artists as new', {
        error: error instanceof Error ? error.message : String(error),
        artistCount: names.length
      });
      return { existing: [], new: [...names] };
    }

    const byLowerName = new Map<string, ArtistRecord>();
    for (const record of records) {
      byLowerName.set(record.name.toLowerCase(), record);
    }

    const result: ReconciliationResult = { existing: [], new: [] };
    for (const name of names) {
      const match = byLowerName.get(name.toLowerCase());
      if (match) {
        result.existing.push(match);
      } else {
        result.new.push(name);
      }
    }

    logger.debug('Artist reconciliation complete', {
      existing: result.existing.length,
      new: result.new.length
    });

    return result;
  }
}
