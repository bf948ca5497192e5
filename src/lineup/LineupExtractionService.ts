/**
 * Lineup Extraction Service
 *
 * One upload in, one summary out: vision call, name parsing, registry
 * reconciliation, CSV rendering and storage. Failures come back as values
 * so the HTTP layer can pick a status code from the error kind.
 */

import type { VisionModelProvider } from '../image-processor/types.js';
import type { UploadStore } from '../storage/UploadStore.js';
import type { ArtistReconciler } from './ArtistReconciler.js';
import { generateLineupCsv } from './csv.js';
import { parseArtistNames } from './parseArtistNames.js';
import { LINEUP_EXTRACTION_PROMPT } from './prompts.js';
import {
  ExtractionRequest,
  LineupError,
  LineupExtractionError,
  LineupSummary,
  LineupValidationError,
  Result,
  err,
  ok
} from './types.js';
import { logger } from '../utils/logger.js';

export const NO_ARTISTS_MESSAGE = 'No artists found in the image';

export interface LineupExtractionDependencies {
  visionProvider: VisionModelProvider;
  reconciler: ArtistReconciler;
  uploadStore: UploadStore;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class LineupExtractionService {
  private readonly visionProvider: VisionModelProvider;
  private readonly reconciler: ArtistReconciler;
  private readonly uploadStore: UploadStore;

  constructor(dependencies: LineupExtractionDependencies) {
    this.visionProvider = dependencies.visionProvider;
    this.reconciler = dependencies.reconciler;
    this.uploadStore = dependencies.uploadStore;
  }

  /**
   * Ask the vision model for the lineup and split its reply into names
   */
  async extractArtistNames(image: Buffer, mimeType: string): Promise<Result<string[], LineupError>> {
    let responseText: string;
    try {
      const extraction = await this.visionProvider.extractFromImage(image, mimeType, LINEUP_EXTRACTION_PROMPT);
      logger.info('Vision extraction complete', {
        model: extraction.model,
        processingTimeMs: extraction.processing_time_ms,
        usage: extraction.usage
      });
      responseText = extraction.extracted_text;
    } catch (error) {
      logger.error('Vision extraction failed', error);
      return err(new LineupExtractionError(`Failed to process image: ${describe(error)}`, error));
    }

    const names = parseArtistNames(responseText);
    if (names.length === 0) {
      return err(new LineupValidationError(NO_ARTISTS_MESSAGE));
    }
    return ok(names);
  }

  async extract(request: ExtractionRequest): Promise<Result<LineupSummary, LineupError>> {
    const extracted = await this.extractArtistNames(request.image, request.mimeType);
    if (!extracted.ok) {
      return extracted;
    }
    const artists = extracted.value;

    const reconciliation = await this.reconciler.reconcile(artists);
    const csv = generateLineupCsv(request.festivalName, request.year, artists);

    let csvFilename: string;
    try {
      const saved = await this.uploadStore.saveExtraction({
        festivalName: request.festivalName,
        year: request.year,
        extension: request.extension,
        image: request.image,
        csv
      });
      csvFilename = saved.csvFilename;
    } catch (error) {
      logger.error('Failed to store extraction results', error);
      return err(new LineupExtractionError(`Failed to process image: ${describe(error)}`, error));
    }

    return ok({
      success: true,
      festival_name: request.festivalName,
      year: request.year,
      existing_artists: reconciliation.existing,
      new_artists: reconciliation.new,
      total_artists: artists.length,
      csv_filename: csvFilename,
      csv_download: `/uploads/${encodeURIComponent(csvFilename)}`
    });
  }
}
