import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Pool, PoolClient, PoolConfig } from 'pg';
import type { DatabaseConfig } from '../config/index.js';
import { DATABASE_CONFIG } from './database.constants.js';

/**
 * Lazily created pg pool. Nothing connects until the Postgres vector store
 * issues its first query.
 */
@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private pool: Pool | null = null;

  constructor(
    @Inject(DATABASE_CONFIG) private readonly config: DatabaseConfig,
  ) {}

  getPool(): Pool {
    if (!this.pool) {
      this.pool = this.createPool();
    }
    return this.pool;
  }

  getClient(): Promise<PoolClient> {
    return this.getPool().connect();
  }

  /** Runs `work` inside BEGIN/COMMIT on one client, rolling back on failure. */
  async withTransaction<T>(
    work: (client: PoolClient) => Promise<T>,
  ): Promise<T> {
    const client = await this.getClient();
    try {
      await client.query('BEGIN');
      const result = await work(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        this.logger.error(
          `Rollback failed: ${
            rollbackError instanceof Error
              ? rollbackError.message
              : String(rollbackError)
          }`,
        );
      });
      throw error;
    } finally {
      client.release();
    }
  }

  async onModuleDestroy() {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }

  private createPool(): Pool {
    if (!this.config.url) {
      throw new Error('DATABASE_URL is not configured');
    }

    const poolConfig: PoolConfig = {
      connectionString: this.config.url,
      connectionTimeoutMillis: 10000,
      idleTimeoutMillis: 30000,
      max: 10,
    };
    if (this.config.ssl) {
      poolConfig.ssl = { rejectUnauthorized: false };
    }

    const pool = new Pool(poolConfig);
    pool.on('error', (err) => {
      this.logger.error('Unexpected database pool error', err.stack);
    });
    return pool;
  }
}
