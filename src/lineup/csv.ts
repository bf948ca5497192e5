/**
 * Lineup CSV rendering
 */

import type { LineupRow } from './types.js';

export const LINEUP_CSV_HEADER: ReadonlyArray<keyof LineupRow> = ['festival_name', 'edition', 'artist_name'];

const RECORD_TERMINATOR = '\r\n';
const NEEDS_QUOTING = /[",\r\n]/;

/**
 * Quote a field only when it holds the delimiter, a quote or a line break
 */
export function escapeCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

export function toLineupRows(festivalName: string, year: string, artists: readonly string[]): LineupRow[] {
  return artists.map(artist => ({
    festival_name: festivalName,
    edition: year,
    artist_name: artist
  }));
}

/**
 * Render one row per artist under the header `festival_name,edition,artist_name`.
 * Every record, the last included, ends with CRLF.
 */
export function generateLineupCsv(festivalName: string, year: string, artists: readonly string[]): string {
  const lines = [LINEUP_CSV_HEADER.join(',')];

  for (const row of toLineupRows(festivalName, year, artists)) {
    lines.push(LINEUP_CSV_HEADER.map(column => escapeCsvField(row[column])).join(','));
  }

  return lines.map(line => line + RECORD_TERMINATOR).join('');
}
