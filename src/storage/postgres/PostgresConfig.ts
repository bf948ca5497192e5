export interface PostgresConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  /**
   * SSL configuration for PostgreSQL connection
   */
  ssl?: boolean | { rejectUnauthorized?: boolean };
  /**
   * Connection timeout in milliseconds
   */
  connectionTimeoutMillis?: number;
}

const SSL_REQUIRED_MODES = ['require', 'verify-ca', 'verify-full'];

/**
 * Parse a postgres:// connection string. Returns null for anything that is
 * not a postgres URL with a host.
 */
export function parseDatabaseUrl(databaseUrl: string): PostgresConfig | null {
  let url: URL;
  try {
    url = new URL(databaseUrl);
  } catch {
    return null;
  }

  if (url.protocol !== 'postgres:' && url.protocol !== 'postgresql:') {
    return null;
  }
  if (!url.hostname) {
    return null;
  }

  const sslMode = url.searchParams.get('sslmode');

  return {
    host: url.hostname,
    port: url.port ? parseInt(url.port, 10) : 5432,
    user: decodeURIComponent(url.username),
    password: decodeURIComponent(url.password),
    database: decodeURIComponent(url.pathname.replace(/^\//, '')),
    ssl: sslMode !== null && SSL_REQUIRED_MODES.includes(sslMode)
      ? { rejectUnauthorized: sslMode !== 'require' }
      : undefined,
    connectionTimeoutMillis: 5000
  };
}
