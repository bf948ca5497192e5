import type { ArtistRecord } from '../lineup/types.js';

/**
 * Read-only access to the canonical artist registry
 */
export interface ArtistRepository {
  /**
   * Return every stored artist whose name matches one of `names`, ignoring case.
   * Order of the returned records is unspecified.
   */
  findByNames(names: readonly string[]): Promise<ArtistRecord[]>;
}
