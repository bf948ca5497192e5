/**
 * Builds the process-wide collaborators from configuration
 */

import type { LineupConfig } from './config/index.js';
import { AnthropicVisionProvider } from './image-processor/providers/AnthropicVisionProvider.js';
import type { VisionModelProvider } from './image-processor/types.js';
import { ArtistReconciler } from './lineup/ArtistReconciler.js';
import { LineupExtractionService } from './lineup/LineupExtractionService.js';
import type { ArtistRepository } from './storage/ArtistRepository.js';
import { parseDatabaseUrl } from './storage/postgres/PostgresConfig.js';
import { PostgresConnectionManager } from './storage/postgres/PostgresConnectionManager.js';
import { PostgresArtistRepository } from './storage/postgres/PostgresArtistRepository.js';
import { UploadStore } from './storage/UploadStore.js';
import { logger } from './utils/logger.js';

export interface LineupServices {
  visionProvider: VisionModelProvider;
  artistRepository: ArtistRepository | null;
  uploadStore: UploadStore;
  extractionService: LineupExtractionService;
}

/**
 * Postgres-backed repository for DATABASE_URL, or null when reconciliation is off.
 * An unreachable database at startup is logged but does not disable lookups.
 */
export async function createArtistRepository(databaseUrl: string | undefined): Promise<ArtistRepository | null> {
  if (!databaseUrl) {
    logger.info('DATABASE_URL not set, artist reconciliation disabled');
    return null;
  }

  const postgresConfig = parseDatabaseUrl(databaseUrl);
  if (!postgresConfig) {
    logger.warn('DATABASE_URL could not be parsed, artist reconciliation disabled');
    return null;
  }

  logger.info('Artist reconciliation enabled', {
    host: postgresConfig.host,
    database: postgresConfig.database
  });

  const connections = new PostgresConnectionManager(postgresConfig);
  if (!(await connections.testConnection())) {
    logger.warn('Artist database unreachable at startup, lookups will fall back to new artists until it recovers');
  }
  return new PostgresArtistRepository(connections);
}

export async function createLineupServices(config: LineupConfig): Promise<LineupServices> {
  const visionProvider = new AnthropicVisionProvider({
    provider: 'anthropic',
    apiKey: config.vision.apiKey,
    model: config.vision.model,
    baseUrl: config.vision.baseUrl,
    options: {
      maxTokens: config.vision.maxTokens,
      timeout: config.vision.timeoutMs
    }
  });

  const artistRepository = await createArtistRepository(config.database.url);

  const uploadStore = new UploadStore(config.uploads.dir);
  await uploadStore.initialize();

  const extractionService = new LineupExtractionService({
    visionProvider,
    reconciler: new ArtistReconciler(artistRepository),
    uploadStore
  });

  return { visionProvider, artistRepository, uploadStore, extractionService };
}
