/**
 * Upload Routes
 *
 * Listing and download of stored lineup images and CSVs.
 */

import { Router } from 'express';
import { asyncHandler, NotFoundError } from '../middleware/errorHandler.js';
import type { UploadStore } from '../../storage/UploadStore.js';

export function createUploadRoutes(uploadStore: UploadStore): Router {
  const router = Router();

  /**
   * GET /uploads - stored files, newest first
   */
  router.get('/', asyncHandler(async (_req, res) => {
    const files = await uploadStore.list();
    res.json({ files });
  }));

  /**
   * GET /uploads/:filename - download one stored file
   */
  router.get('/:filename', asyncHandler(async (req, res) => {
    const { filename } = req.params;
    const filePath = await uploadStore.resolve(filename);

    if (!filePath) {
      throw new NotFoundError(`File not found: ${filename}`);
    }

    await new Promise<void>((resolve, reject) => {
      res.sendFile(filePath, (error?: Error) => (error ? reject(error) : resolve()));
    });
  }));

  return router;
}
