import type { ArtistRecord } from '../../lineup/types.js';
import type { ArtistRepository } from '../ArtistRepository.js';
import type { Queryable } from './PostgresConnectionManager.js';

/**
 * Anything that can lend out a connection for one unit of work
 */
export interface ConnectionSource {
  withClient<T>(work: (db: Queryable) => Promise<T>): Promise<T>;
}

/**
 * Build the case-insensitive lookup against the "Artist" table:
 * one `LOWER($n)` placeholder per input name.
 */
export function buildArtistLookupQuery(count: number): string {
  const placeholders = Array.from({ length: count }, (_, i) => `LOWER($${i + 1})`).join(', ');
  return `SELECT name, slug, "imageUrl" FROM "Artist" WHERE LOWER(name) IN (${placeholders})`;
}

function toArtistRecord(row: unknown): ArtistRecord | null {
  if (typeof row !== 'object' || row === null) {
    return null;
  }
  const name = 'name' in row ? row.name : undefined;
  const slug = 'slug' in row ? row.slug : undefined;
  const imageUrl = 'imageUrl' in row ? row.imageUrl : undefined;

  if (typeof name !== 'string' || typeof slug !== 'string') {
    return null;
  }

  return {
    name,
    slug,
    imageUrl: typeof imageUrl === 'string' ? imageUrl : null
  };
}

export class PostgresArtistRepository implements ArtistRepository {
  constructor(private readonly connections: ConnectionSource) {}

  async findByNames(names: readonly string[]): Promise<ArtistRecord[]> {
    if (names.length === 0) {
      return [];
    }

    const result = await this.connections.withClient(db =>
      db.query(buildArtistLookupQuery(names.length), [...names])
    );

    return result.rows
      .map(toArtistRecord)
      .filter((record): record is ArtistRecord => record !== null);
  }
}
