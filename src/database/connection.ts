import { Pool, PoolConfig } from 'pg';
import { readFileSync } from 'fs';
import { join } from 'path';
import type { DatabaseConfig } from '../config/config';

/**
 * Minimal query surface the item repository needs. `pg.Pool` satisfies it;
 * tests hand in an in-process fake.
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export class DatabaseConnection {
  private static pool: Pool | null = null;

  private static getConfig(config: DatabaseConfig): PoolConfig {
    return {
      connectionString: config.url,
      max: config.poolMax,
      idleTimeoutMillis: config.idleTimeout,
      connectionTimeoutMillis: config.connectionTimeout,
      ssl: config.ssl ? {
        rejectUnauthorized: process.env.DB_SSL_REJECT_UNAUTHORIZED !== 'false'
      } : false
    };
  }

  static getPool(config: DatabaseConfig): Pool {
    if (!this.pool) {
      this.pool = new Pool(this.getConfig(config));

      // Handle pool errors
      this.pool.on('error', (err: Error) => {
        console.error('Unexpected error on idle database client:', err.message);
      });

      if (process.env.NODE_ENV === 'development') {
        this.pool.on('connect', () => {
          console.log('📦 New database client connected');
        });
      }
    }

    return this.pool;
  }

  static async initializeSchema(db: Queryable): Promise<void> {
    const schemaPath = join(__dirname, '../../database/schema.sql');
    const schema = readFileSync(schemaPath, 'utf8');

    await db.query(schema);
    console.log('✅ Database schema initialized');
  }

  static async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      console.log('📦 Database pool closed');
    }
  }
}
