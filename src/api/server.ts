import express from 'express';
import cors from 'cors';
import type { Server } from 'http';
import type { LineupExtractionService } from '../lineup/LineupExtractionService.js';
import type { UploadStore } from '../storage/UploadStore.js';
import { DEFAULT_MAX_UPLOAD_BYTES } from '../config/index.js';
import { logger } from '../utils/logger.js';

// Import route handlers
import { createHomeRoutes } from './routes/home.js';
import { createExtractRoutes } from './routes/extract.js';
import { createUploadRoutes } from './routes/uploads.js';

// Import middleware
import { errorHandler } from './middleware/errorHandler.js';
import { requestLogger } from './middleware/requestLogger.js';

export interface ApiServerOptions {
  port?: number;
  host?: string;
  enableCors?: boolean;
  corsOrigins?: string[];
  maxFileSizeBytes?: number;
  cdnBaseUrl?: string;
  /** Override for the upload page template */
  templatePath?: string;
}

export interface ApiServerDependencies {
  extractionService: LineupExtractionService;
  uploadStore: UploadStore;
}

/**
 * Creates and configures the Express API server
 */
export function createApiServer(
  dependencies: ApiServerDependencies,
  options: ApiServerOptions = {}
): express.Application {
  const app = express();

  const {
    enableCors = true,
    corsOrigins = ['*'],
    maxFileSizeBytes = DEFAULT_MAX_UPLOAD_BYTES,
    cdnBaseUrl = ''
  } = options;

  app.use(express.urlencoded({ extended: true }));

  if (enableCors) {
    app.use(cors({
      origin: corsOrigins.includes('*') ? true : corsOrigins,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type']
    }));
  }

  app.use(requestLogger);

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime()
    });
  });

  app.use('/', createHomeRoutes({ cdnBaseUrl, templatePath: options.templatePath }));
  app.use('/extract', createExtractRoutes(dependencies.extractionService, { maxFileSizeBytes }));
  app.use('/uploads', createUploadRoutes(dependencies.uploadStore));

  // 404 handler
  app.use('*', (req, res) => {
    res.status(404).json({
      error: `Route ${req.method} ${req.originalUrl} not found`
    });
  });

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}

/**
 * Starts the API server
 */
export async function startApiServer(
  dependencies: ApiServerDependencies,
  options: ApiServerOptions = {}
): Promise<{ app: express.Application; server: Server }> {
  const {
    port = 5000,
    host = '0.0.0.0'
  } = options;

  const app = createApiServer(dependencies, options);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info(`Lineup extractor listening on ${host}:${port}`);
      logger.info(`Health check: http://${host}:${port}/health`);
      resolve({ app, server });
    });

    server.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EADDRINUSE') {
        logger.error(`Port ${port} is already in use`);
      } else {
        logger.error('Failed to start API server', error);
      }
      reject(error);
    });
  });
}

/**
 * Gracefully shuts down the API server
 */
export function shutdownApiServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    logger.info('Shutting down API server...');
    server.close((error?: Error) => {
      if (error) {
        reject(error);
        return;
      }
      logger.info('API server shut down successfully');
      resolve();
    });
  });
}
