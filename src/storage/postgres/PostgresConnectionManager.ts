import { Client } from 'pg';
import type { PostgresConfig } from './PostgresConfig.js';
import { logger } from '../../utils/logger.js';

/**
 * What a caller may do with an open connection
 */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
}

/**
 * Opens one PostgreSQL connection per unit of work and closes it afterwards.
 * Lookups are rare and short, so no pool is kept between requests.
 */
export class PostgresConnectionManager {
  private readonly config: PostgresConfig;

  constructor(config: PostgresConfig) {
    this.config = config;
  }

  /**
   * Run `work` against a fresh connection, closing it whatever the outcome
   */
  async withClient<T>(work: (db: Queryable) => Promise<T>): Promise<T> {
    const client = new Client({
      host: this.config.host,
      port: this.config.port,
      user: this.config.user,
      password: this.config.password,
      database: this.config.database,
      ssl: this.config.ssl,
      connectionTimeoutMillis: this.config.connectionTimeoutMillis || 5000,
    });

    client.on('error', (err) => {
      logger.error('Unexpected error on PostgreSQL client', err);
    });

    await client.connect();
    logger.debug('PostgreSQL connection opened', {
      host: this.config.host,
      port: this.config.port,
      database: this.config.database,
    });

    try {
      return await work({
        query: (text, params) => client.query(text, params),
      });
    } finally {
      await client.end();
      logger.debug('PostgreSQL connection closed');
    }
  }

  /**
   * Test the database connection
   */
  async testConnection(): Promise<boolean> {
    try {
      const result = await this.withClient(db => db.query('SELECT NOW() AS now'));
      logger.info('PostgreSQL connection test successful', {
        serverTime: result.rows[0],
      });
      return true;
    } catch (error) {
      logger.error('PostgreSQL connection test failed', error);
      return false;
    }
  }
}
