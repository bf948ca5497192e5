/**
 * Lineup extraction domain types
 */

export const DEFAULT_FESTIVAL_NAME = 'Unknown Festival';
export const DEFAULT_EDITION = '2026';

/**
 * One lineup upload, alive for a single request
 */
export interface ExtractionRequest {
  image: Buffer;
  /** Lower-cased file extension without the dot */
  extension: string;
  mimeType: string;
  festivalName: string;
  year: string;
}

/**
 * Known artist from the canonical registry
 */
export interface ArtistRecord {
  name: string;
  slug: string;
  imageUrl: string | null;
}

export interface LineupRow {
  festival_name: string;
  edition: string;
  artist_name: string;
}

export interface ReconciliationResult {
  existing: ArtistRecord[];
  new: string[];
}

/**
 * JSON body returned for a successful extraction
 */
export interface LineupSummary {
  success: true;
  festival_name: string;
  year: string;
  existing_artists: ArtistRecord[];
  new_artists: string[];
  total_artists: number;
  csv_filename: string;
  csv_download: string;
}

// ============================================================================
// Errors and results
// ============================================================================

/**
 * The upload or its outcome was unusable (bad file, nothing extracted)
 */
export class LineupValidationError extends Error {
  readonly kind = 'validation' as const;

  constructor(message: string) {
    super(message);
    this.name = 'LineupValidationError';
  }
}

/**
 * The vision call, or storing its results, failed
 */
export class LineupExtractionError extends Error {
  readonly kind = 'extraction' as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'LineupExtractionError';
  }
}

export type LineupError = LineupValidationError | LineupExtractionError;

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
