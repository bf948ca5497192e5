/**
 * Upload Store - lineup images and generated CSVs on local disk
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { formatTimestamp, isPlainFilename, secureFilename } from '../utils/filename.js';
import { logger } from '../utils/logger.js';

export interface StoredUpload {
  name: string;
  size: number;
  /** ISO-8601 modification time */
  modified: string;
}

export interface SaveExtractionInput {
  festivalName: string;
  year: string;
  extension: string;
  image: Buffer;
  csv: string;
}

export interface SavedExtraction {
  baseName: string;
  imageFilename: string;
  csvFilename: string;
}

/** Upper bound on `-N` suffixes tried for one base name */
const MAX_SUFFIX_ATTEMPTS = 1000;

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class UploadStore {
  private readonly directory: string;
  private readonly now: () => Date;

  constructor(directory: string, now: () => Date = () => new Date()) {
    this.directory = path.resolve(directory);
    this.now = now;
  }

  /**
   * Create the uploads directory if needed
   */
  async initialize(): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
    logger.info(`Upload store ready at ${this.directory}`);
  }

  /**
   * `<festival>_<year>_<YYYYMMDD_HHMMSS>`, both text parts sanitized
   */
  buildBaseName(festivalName: string, year: string, date: Date): string {
    const festival = secureFilename(festivalName) || 'lineup';
    const edition = secureFilename(year) || 'unknown';
    return `${festival}_${edition}_${formatTimestamp(date)}`;
  }

  /**
   * Write the image and CSV side by side. When either name is taken, `-1`, `-2`, ...
   * is appended to the base name until both are free.
   */
  async saveExtraction(input: SaveExtractionInput): Promise<SavedExtraction> {
    const base = this.buildBaseName(input.festivalName, input.year, this.now());

    for (let attempt = 0; attempt < MAX_SUFFIX_ATTEMPTS; attempt++) {
      const baseName = attempt === 0 ? base : `${base}-${attempt}`;
      const imageFilename = `${baseName}.${input.extension}`;
      const csvFilename = `${baseName}.csv`;
      const imagePath = path.join(this.directory, imageFilename);
      const csvPath = path.join(this.directory, csvFilename);

      try {
        await fs.writeFile(imagePath, input.image, { flag: 'wx' });
      } catch (error) {
        if (isAlreadyExists(error)) continue;
        throw error;
      }

      try {
        await fs.writeFile(csvPath, input.csv, { encoding: 'utf-8', flag: 'wx' });
      } catch (error) {
        await fs.rm(imagePath, { force: true });
        if (isAlreadyExists(error)) continue;
        throw error;
      }

      logger.info('Saved lineup extraction', { imageFilename, csvFilename });
      return { baseName, imageFilename, csvFilename };
    }

    throw new Error(`Could not find a free filename for ${base}`);
  }

  /**
   * Stored files, newest first
   */
  async list(): Promise<StoredUpload[]> {
    const entries = await fs.readdir(this.directory, { withFileTypes: true });

    const files = await Promise.all(
      entries
        .filter(entry => entry.isFile())
        .map(async entry => {
          const stat = await fs.stat(path.join(this.directory, entry.name));
          return { name: entry.name, size: stat.size, mtimeMs: stat.mtimeMs };
        })
    );

    return files
      .sort((a, b) => b.mtimeMs - a.mtimeMs)
      .map(file => ({
        name: file.name,
        size: file.size,
        modified: new Date(file.mtimeMs).toISOString()
      }));
  }

  /**
   * Absolute path of a stored file, or null when the name is not a plain
   * file name in the store or nothing is stored under it
   */
  async resolve(filename: string): Promise<string | null> {
    if (!isPlainFilename(filename)) {
      return null;
    }

    const filePath = path.join(this.directory, filename);
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile() ? filePath : null;
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }
}
