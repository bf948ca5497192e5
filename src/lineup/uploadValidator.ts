/**
 * Upload validation for lineup images
 */

import {
  DEFAULT_EDITION,
  DEFAULT_FESTIVAL_NAME,
  LineupValidationError,
  Result,
  err,
  ok
} from './types.js';

export const ALLOWED_EXTENSIONS = ['png', 'jpg', 'jpeg', 'gif', 'webp'] as const;

export type AllowedExtension = typeof ALLOWED_EXTENSIONS[number];

const MIME_TYPES: Record<AllowedExtension, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  webp: 'image/webp'
};

export const INVALID_FILE_TYPE_MESSAGE = `Invalid file type. Allowed: ${ALLOWED_EXTENSIONS.join(', ')}`;

/**
 * The parts of a multipart file the validator looks at
 */
export interface UploadedImage {
  originalname: string;
  buffer: Buffer;
}

export interface ValidatedImage {
  data: Buffer;
  extension: AllowedExtension;
  mimeType: string;
}

function isAllowedExtension(value: string): value is AllowedExtension {
  return (ALLOWED_EXTENSIONS as readonly string[]).includes(value);
}

/**
 * Lower-cased text after the last '.', or null when the name has no dot
 */
export function getExtension(filename: string): string | null {
  const index = filename.lastIndexOf('.');
  if (index === -1) {
    return null;
  }
  return filename.slice(index + 1).toLowerCase();
}

export function mimeTypeForExtension(extension: string): string {
  return isAllowedExtension(extension) ? MIME_TYPES[extension] : 'image/jpeg';
}

export interface UploadValidationOptions {
  /** The image field was submitted with no file chosen */
  emptySelection?: boolean;
}

export function validateUpload(
  file: UploadedImage | undefined,
  options: UploadValidationOptions = {}
): Result<ValidatedImage, LineupValidationError> {
  if (!file) {
    return err(new LineupValidationError(options.emptySelection ? 'No file selected' : 'No image file provided'));
  }

  if (file.originalname === '') {
    return err(new LineupValidationError('No file selected'));
  }

  const extension = getExtension(file.originalname);
  if (extension === null || !isAllowedExtension(extension)) {
    return err(new LineupValidationError(INVALID_FILE_TYPE_MESSAGE));
  }

  return ok({
    data: file.buffer,
    extension,
    mimeType: mimeTypeForExtension(extension)
  });
}

function formField(value: unknown, fallback: string): string {
  if (typeof value !== 'string') {
    return fallback;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : fallback;
}

/**
 * Festival name and edition from the form body, with defaults for absent or blank fields
 */
export function readLineupFields(body: unknown): { festivalName: string; year: string } {
  const fields = typeof body === 'object' && body !== null ? body : {};
  return {
    festivalName: formField('festival_name' in fields ? fields.festival_name : undefined, DEFAULT_FESTIVAL_NAME),
    year: formField('year' in fields ? fields.year : undefined, DEFAULT_EDITION)
  };
}
