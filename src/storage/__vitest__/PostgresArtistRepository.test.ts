import { describe, it, expect, vi } from 'vitest';
import {
  PostgresArtistRepository,
  buildArtistLookupQuery,
  type ConnectionSource
} from '../postgres/PostgresArtistRepository.js';
import type { Queryable } from '../postgres/PostgresConnectionManager.js';

function createConnectionSource(rows: unknown[]) {
  const query = vi.fn(async (_text: string, _params?: unknown[]) => ({ rows }));
  const db: Queryable = { query };
  const source: ConnectionSource = {
    withClient<T>(work: (client: Queryable) => Promise<T>): Promise<T> {
      return work(db);
    }
  };
  const withClient = vi.spyOn(source, 'withClient');
  return { source, query, withClient };
}

describe('PostgresArtistRepository', () => {
  describe('buildArtistLookupQuery', () => {
    it('should emit one case-insensitive placeholder per name', () => {
      expect(buildArtistLookupQuery(3)).toBe(
        'SELECT name, slug, "imageUrl" FROM "Artist" WHERE LOWER(name) IN (LOWER($1), LOWER($2), LOWER($3))'
      );
    });
  });

  describe('findByNames', () => {
    it('should run a single parameterized query and map the rows', async () => {
      const { source, query, withClient } = createConnectionSource([
        { name: 'Skrillex', slug: 'skrillex', imageUrl: 'artists/skrillex.jpg' },
        { name: 'Four Tet', slug: 'four-tet', imageUrl: null }
      ]);
      const repository = new PostgresArtistRepository(source);

      const records = await repository.findByNames(['skrillex', 'Four Tet']);

      expect(withClient).toHaveBeenCalledTimes(1);
      expect(query).toHaveBeenCalledWith(
        'SELECT name, slug, "imageUrl" FROM "Artist" WHERE LOWER(name) IN (LOWER($1), LOWER($2))',
        ['skrillex', 'Four Tet']
      );
      expect(records).toEqual([
        { name: 'Skrillex', slug: 'skrillex', imageUrl: 'artists/skrillex.jpg' },
        { name: 'Four Tet', slug: 'four-tet', imageUrl: null }
      ]);
    });

    it('should not open a connection for an empty list', async () => {
      const { source, withClient } = createConnectionSource([]);
      const repository = new PostgresArtistRepository(source);

      expect(await repository.findByNames([])).toEqual([]);
      expect(withClient).not.toHaveBeenCalled();
    });

    it('should drop rows without a name or slug', async () => {
      const { source } = createConnectionSource([
        { name: 'Bicep', slug: 'bicep' },
        { name: null, slug: 'ghost' },
        { name: 'No Slug' },
        'not-a-row'
      ]);
      const repository = new PostgresArtistRepository(source);

      expect(await repository.findByNames(['Bicep'])).toEqual([
        { name: 'Bicep', slug: 'bicep', imageUrl: null }
      ]);
    });

    it('should propagate query failures', async () => {
      const source: ConnectionSource = {
        withClient: () => Promise.reject(new Error('connection refused'))
      };
      const repository = new PostgresArtistRepository(source);

      await expect(repository.findByNames(['Bicep'])).rejects.toThrow('connection refused');
    });
  });
});
