/**
 * Central configuration for the lineup extractor.
 * Everything is read from environment variables once at startup and passed
 * down explicitly.
 */

import * as path from 'path';
import { logger, parseLogLevel, type LogLevel } from '../utils/logger.js';
import {
  DEFAULT_ANTHROPIC_BASE_URL,
  DEFAULT_ANTHROPIC_MAX_TOKENS,
  DEFAULT_ANTHROPIC_MODEL
} from '../image-processor/providers/AnthropicVisionProvider.js';
import { DEFAULT_VISION_TIMEOUT_MS } from '../image-processor/providers/BaseCloudVisionProvider.js';
import { parseDatabaseUrl } from '../storage/postgres/PostgresConfig.js';

export const DEFAULT_MAX_UPLOAD_BYTES = 5 * 1024 * 1024;

export interface LineupConfig {
  server: {
    port: number;
    host: string;
    corsOrigins: string[];
  };

  vision: {
    apiKey?: string;
    model: string;
    baseUrl: string;
    maxTokens: number;
    timeoutMs: number;
  };

  database: {
    /** Unset disables artist reconciliation */
    url?: string;
  };

  uploads: {
    dir: string;
    maxFileSizeBytes: number;
  };

  /** Base URL prepended to artist image paths on the upload page */
  cdnBaseUrl: string;

  logLevel: LogLevel;
}

function parseIntOr(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Load configuration from environment variables
 */
export function loadLineupConfig(env: NodeJS.ProcessEnv = process.env): LineupConfig {
  const config: LineupConfig = {
    server: {
      port: parseIntOr(env.PORT, 5000),
      host: optional(env.HOST) || '0.0.0.0',
      corsOrigins: (optional(env.CORS_ORIGINS) || '*')
        .split(',')
        .map(origin => origin.trim())
        .filter(origin => origin.length > 0),
    },
    vision: {
      apiKey: optional(env.ANTHROPIC_API_KEY),
      model: optional(env.ANTHROPIC_MODEL) || DEFAULT_ANTHROPIC_MODEL,
      baseUrl: optional(env.ANTHROPIC_BASE_URL) || DEFAULT_ANTHROPIC_BASE_URL,
      maxTokens: parseIntOr(env.VISION_MAX_TOKENS, DEFAULT_ANTHROPIC_MAX_TOKENS),
      timeoutMs: parseIntOr(env.VISION_TIMEOUT_MS, DEFAULT_VISION_TIMEOUT_MS),
    },
    database: {
      url: optional(env.DATABASE_URL),
    },
    uploads: {
      dir: path.resolve(optional(env.UPLOADS_DIR) || path.join(process.cwd(), 'uploads')),
      maxFileSizeBytes: parseIntOr(env.MAX_UPLOAD_BYTES, DEFAULT_MAX_UPLOAD_BYTES),
    },
    cdnBaseUrl: optional(env.CDN_BASE_URL) || optional(env.NEXT_PUBLIC_CLOUDFRONT_URL) || '',
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };

  logger.debug('Configuration loaded', {
    port: config.server.port,
    model: config.vision.model,
    reconciliation: config.database.url ? 'enabled' : 'disabled',
    uploadsDir: config.uploads.dir,
  });

  return config;
}

/**
 * Collect every configuration problem; an empty list means the config is usable
 */
export function getConfigErrors(config: LineupConfig): string[] {
  const errors: string[] = [];

  if (config.server.port < 1 || config.server.port > 65535) {
    errors.push('Server port must be between 1 and 65535');
  }

  if (!config.vision.apiKey) {
    errors.push('ANTHROPIC_API_KEY is required');
  }

  if (config.vision.maxTokens < 1) {
    errors.push('VISION_MAX_TOKENS must be at least 1');
  }

  if (config.vision.timeoutMs < 1) {
    errors.push('VISION_TIMEOUT_MS must be at least 1');
  }

  if (config.database.url && !parseDatabaseUrl(config.database.url)) {
    errors.push('DATABASE_URL must be a postgres:// connection string');
  }

  if (config.uploads.maxFileSizeBytes < 1) {
    errors.push('MAX_UPLOAD_BYTES must be at least 1');
  }

  return errors;
}

export function validateLineupConfig(config: LineupConfig): void {
  const errors = getConfigErrors(config);

  if (errors.length > 0) {
    const errorMessage = `Configuration validation failed: ${errors.join(', ')}`;
    logger.error(errorMessage);
    throw new Error(errorMessage);
  }

  logger.debug('Configuration validation passed');
}

/**
 * Load and validate configuration
 */
export function loadAndValidateConfig(env: NodeJS.ProcessEnv = process.env): LineupConfig {
  const config = loadLineupConfig(env);
  validateLineupConfig(config);
  return config;
}
