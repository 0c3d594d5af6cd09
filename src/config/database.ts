import { readdir, readFile } from 'fs/promises';
import path from 'path';
import { Pool, QueryResultRow } from 'pg';
import logger from './logger';
import type { DatabaseConfig, QueryResult, Transaction, TransactionalDatabase } from '@/types/database';

const MIGRATIONS_DIR = path.resolve(__dirname, '../../migrations');

export class DatabaseService implements TransactionalDatabase {
  private pool: Pool;
  private static instance: DatabaseService;

  constructor(config?: DatabaseConfig) {
    const dbConfig = config || this.getConfigFromEnv();

    this.pool = new Pool({
      host: dbConfig.host,
      port: dbConfig.port,
      database: dbConfig.database,
      user: dbConfig.username,
      password: dbConfig.password,
      ssl: dbConfig.ssl ? { rejectUnauthorized: false } : false,
      max: dbConfig.maxConnections || 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    this.setupEventListeners();
  }

  public static getInstance(): DatabaseService {
    if (!DatabaseService.instance) {
      DatabaseService.instance = new DatabaseService();
    }
    return DatabaseService.instance;
  }

  private getConfigFromEnv(): DatabaseConfig {
    const url = process.env.DATABASE_URL;
    if (url) {
      const parsed = new URL(url);
      return {
        host: parsed.hostname,
        port: parseInt(parsed.port) || 5432,
        database: parsed.pathname.slice(1),
        username: decodeURIComponent(parsed.username),
        password: decodeURIComponent(parsed.password),
        ssl: process.env.NODE_ENV === 'production',
      };
    }

    return {
      host: process.env.DB_HOST || 'localhost',
      port: parseInt(process.env.DB_PORT || '5432'),
      database: process.env.DB_NAME || 'clinic_slots',
      username: process.env.DB_USER || 'postgres',
      password: process.env.DB_PASSWORD || 'password',
      ssl: process.env.NODE_ENV === 'production',
    };
  }

  private setupEventListeners(): void {
    this.pool.on('connect', () => {
      logger.debug('New database connection established');
    });

    this.pool.on('error', (err) => {
      logger.error('Database connection error:', err);
    });
  }

  async query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>> {
    const start = Date.now();
    const client = await this.pool.connect();

    try {
      const result = await client.query<T>(text, params);
      const duration = Date.now() - start;

      logger.debug('Executed query', {
        text: text.substring(0, 100),
        duration,
        rows: result.rowCount
      });

      return {
        rows: result.rows,
        rowCount: result.rowCount || 0,
        command: result.command
      };
    } catch (error) {
      logger.error('Database query error:', { text, error });
      throw error;
    } finally {
      client.release();
    }
  }

  async queryOne<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<T | null> {
    const result = await this.query<T>(text, params);
    return result.rows[0] || null;
  }

  async transaction<T>(callback: (trx: Transaction) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');

      const transaction: Transaction = {
        query: async <U extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) => {
          const result = await client.query<U>(text, params);
          return {
            rows: result.rows,
            rowCount: result.rowCount || 0,
            command: result.command
          };
        },
      };

      const result = await callback(transaction);
      await client.query('COMMIT');

      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      logger.debug('Transaction rolled back', {
        reason: error instanceof Error ? error.message : String(error)
      });
      throw error;
    } finally {
      client.release();
    }
  }

  // Применяет *.sql из migrations/ по порядку имён, каждый файл один раз
  async runMigrations(): Promise<string[]> {
    await this.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        name VARCHAR(255) PRIMARY KEY,
        applied_at TIMESTAMP NOT NULL DEFAULT NOW()
      )
    `);

    const files = (await readdir(MIGRATIONS_DIR))
      .filter(file => file.endsWith('.sql'))
      .sort();

    const applied = await this.query<{ name: string }>('SELECT name FROM schema_migrations');
    const done = new Set(applied.rows.map(row => row.name));
    const pending = files.filter(file => !done.has(file));

    for (const file of pending) {
      const sql = await readFile(path.join(MIGRATIONS_DIR, file), 'utf8');
      await this.transaction(async (trx) => {
        await trx.query(sql);
        await trx.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
      });
      logger.info('Migration applied', { file });
    }

    return pending;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.query('SELECT 1');
      return true;
    } catch (error) {
      logger.error('Database health check failed:', error);
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    logger.info('Database connection pool closed');
  }
}

export type { DatabaseConfig, QueryResult, Transaction };
