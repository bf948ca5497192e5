import type { Request, Response, NextFunction, RequestHandler } from 'express';
import multer from 'multer';
import { PayloadTooLargeError } from './errorHandler.js';

export const IMAGE_FIELD = 'image';

/** Stray file parts tolerated next to the image before multer rejects the request */
const MAX_FILES_PER_REQUEST = 5;

export function formatSizeLimit(bytes: number): string {
  const mb = bytes / (1024 * 1024);
  if (mb >= 1) {
    return Number.isInteger(mb) ? `${mb}MB` : `${mb.toFixed(1)}MB`;
  }
  return `${Math.max(1, Math.round(bytes / 1024))}KB`;
}

/**
 * Parse a multipart body into memory. File parts under any field name are
 * accepted; the route picks the `image` one with findImageFile.
 * Extension checks happen later so the caller gets the lineup-specific message.
 */
export function createImageUpload(maxFileSizeBytes: number): RequestHandler {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxFileSizeBytes,
      files: MAX_FILES_PER_REQUEST
    }
  }).any();

  return (req: Request, res: Response, next: NextFunction) => {
    upload(req, res, (error: unknown) => {
      if (error instanceof multer.MulterError && error.code === 'LIMIT_FILE_SIZE') {
        next(new PayloadTooLargeError(`File too large. Maximum size is ${formatSizeLimit(maxFileSizeBytes)}`));
        return;
      }
      next(error);
    });
  };
}

/**
 * First uploaded file sent under the `image` field
 */
export function findImageFile(req: Request): Express.Multer.File | undefined {
  return Array.isArray(req.files)
    ? req.files.find(file => file.fieldname === IMAGE_FIELD)
    : undefined;
}

/**
 * True when the `image` part arrived without a file. Browsers send
 * `filename=""` for an empty file input, which busboy reads as a text field.
 */
export function isEmptyImageSelection(req: Request): boolean {
  const body: unknown = req.body;
  return typeof body === 'object'
    && body !== null
    && IMAGE_FIELD in body
    && typeof body[IMAGE_FIELD] === 'string';
}
