import { Pool, PoolClient, PoolConfig, QueryResult, QueryResultRow } from 'pg';
import { readFileSync } from 'fs';
import { join } from 'path';

export interface DatabaseConfig {
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  connectionString?: string;
  ssl?: boolean | { rejectUnauthorized?: boolean };
  max?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

/** The part of the client repositories need; tests substitute an in-memory fake. */
export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
}

export class DatabaseClient implements Queryable {
  private pool: Pool;
  private static instance: DatabaseClient | undefined;

  private constructor(config: DatabaseConfig) {
    const poolConfig: PoolConfig = {
      ssl: config.ssl === true ? { rejectUnauthorized: true } : config.ssl || false,
      max: config.max || parseInt(process.env.PG_MAX_CLIENTS || '10'),
      idleTimeoutMillis: config.idleTimeoutMillis || 30000,
      connectionTimeoutMillis: config.connectionTimeoutMillis || 2000,
    };

    if (config.connectionString) {
      poolConfig.connectionString = config.connectionString;
    } else {
      poolConfig.host = config.host;
      poolConfig.port = config.port;
      poolConfig.database = config.database;
      poolConfig.user = config.user;
      poolConfig.password = config.password;
    }

    this.pool = new Pool(poolConfig);

    this.pool.on('error', (err: Error) => {
      console.error('Database pool error:', err);
    });
  }

  public static getInstance(): DatabaseClient {
    if (!DatabaseClient.instance) {
      DatabaseClient.instance = new DatabaseClient(DatabaseClient.configFromEnv());
    }
    return DatabaseClient.instance;
  }

  public static configFromEnv(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
    // Support DATABASE_URL for easy deployment
    if (env.DATABASE_URL) {
      return {
        connectionString: env.DATABASE_URL,
        ssl: env.DB_SSL === 'true' ? { rejectUnauthorized: false } : false,
      };
    }

    const port = parseInt(env.DB_PORT || '5432');
    if (isNaN(port) || port <= 0 || port > 65535) {
      throw new Error(`Invalid DB_PORT: ${env.DB_PORT}. Must be a valid port number.`);
    }

    return {
      host: env.DB_HOST || 'localhost',
      port,
      database: env.DB_NAME || 'dsc_monitoring',
      user: env.DB_USER || 'postgres',
      password: env.DB_PASSWORD || '',
      ssl: env.DB_SSL === 'true',
    };
  }

  /**
   * Execute a query using the pool. Automatically manages client lifecycle.
   * Does not wrap in a transaction - use withTransaction for multi-statement operations.
   */
  public async query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[],
  ): Promise<QueryResult<T>> {
    const start = Date.now();
    try {
      const result = await this.pool.query<T>(text, params);
      const duration = Date.now() - start;

      if (duration > 500) {
        console.warn(`Slow query detected (${duration}ms):`, text.substring(0, 100));
      }

      return result;
    } catch (error) {
      console.error(`Query failed after ${Date.now() - start}ms:`, {
        sql: text.substring(0, 100),
        params: params?.length ? `[${params.length} params]` : 'none',
        errorMessage: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  /**
   * Execute multiple queries within a transaction.
   * Automatically handles BEGIN/COMMIT/ROLLBACK.
   */
  public async withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }

  /**
   * Initialize database schema from schema.sql file.
   * Uses IF NOT EXISTS patterns for idempotency.
   */
  public async initializeSchema(): Promise<void> {
    const schemaPath = process.env.DB_SCHEMA_PATH || join(__dirname, 'schema.sql');
    const statements = readFileSync(schemaPath, 'utf8')
      .split(';')
      .map((stmt) => stmt.trim())
      .filter((stmt) => stmt.length > 0);

    console.log('Initializing database schema...');
    await this.withTransaction(async (client) => {
      for (const statement of statements) {
        await client.query(statement);
      }
    });
    console.log('Database schema initialized successfully');
  }

  public async close(): Promise<void> {
    console.log('Closing database connection pool...');
    await this.pool.end();
    DatabaseClient.instance = undefined;
    console.log('Database connection pool closed');
  }
}
