/**
 * Lineup Extraction Route
 *
 * POST /extract - multipart upload of a lineup image.
 * Fields: image (file, required), festival_name, year.
 */

import { Router, type Response } from 'express';
import { asyncHandler } from '../middleware/errorHandler.js';
import { createImageUpload, findImageFile, isEmptyImageSelection } from '../middleware/upload.js';
import type { LineupExtractionService } from '../../lineup/LineupExtractionService.js';
import type { LineupError } from '../../lineup/types.js';
import { readLineupFields, validateUpload } from '../../lineup/uploadValidator.js';

export function statusForLineupError(error: LineupError): number {
  switch (error.kind) {
    case 'validation':
      return 400;
    case 'extraction':
      return 500;
  }
}

function sendLineupError(res: Response, error: LineupError): void {
  res.status(statusForLineupError(error)).json({ error: error.message });
}

export function createExtractRoutes(
  extractionService: LineupExtractionService,
  options: { maxFileSizeBytes: number }
): Router {
  const router = Router();

  router.post('/', createImageUpload(options.maxFileSizeBytes), asyncHandler(async (req, res) => {
    const validated = validateUpload(findImageFile(req), {
      emptySelection: isEmptyImageSelection(req)
    });
    if (!validated.ok) {
      sendLineupError(res, validated.error);
      return;
    }

    const { festivalName, year } = readLineupFields(req.body);

    const result = await extractionService.extract({
      image: validated.value.data,
      extension: validated.value.extension,
      mimeType: validated.value.mimeType,
      festivalName,
      year
    });

    if (!result.ok) {
      sendLineupError(res, result.error);
      return;
    }

    res.json(result.value);
  }));

  return router;
}
