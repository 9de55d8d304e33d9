import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import retry from 'async-retry';
import { readFileSync } from 'fs';
import { join } from 'path';
import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';

/**
 * PostgreSQL connection pool. Acquiring a connection is retried with backoff;
 * statements themselves run once, since an INSERT is not safe to replay.
 */
@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private pool: Pool;

  constructor(private readonly configService: ConfigService) {}

  async onModuleInit(): Promise<void> {
    const connectionString = this.configService.get<string>('database.url');
    if (!connectionString) {
      throw new Error('DATABASE_URL is required');
    }

    this.pool = new Pool({
      connectionString,
      max: 20,
      connectionTimeoutMillis: 10000,
      idleTimeoutMillis: 30000,
    });

    this.pool.on('error', (error: Error) => {
      this.logger.error(`Idle client error: ${error.message}`);
    });

    await this.applySchema();
    this.logger.log('Database pool initialized');
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool?.end();
  }

  async query<T extends QueryResultRow>(
    sql: string,
    params: unknown[] = [],
  ): Promise<QueryResult<T>> {
    const client = await this.acquireClient();
    try {
      return await client.query<T>(sql, params);
    } finally {
      client.release();
    }
  }

  async queryOne<T extends QueryResultRow>(
    sql: string,
    params: unknown[] = [],
  ): Promise<T | null> {
    const result = await this.query<T>(sql, params);
    return result.rows[0] ?? null;
  }

  private acquireClient(): Promise<PoolClient> {
    return retry(() => this.pool.connect(), {
      retries: 3,
      minTimeout: 200,
      maxTimeout: 2000,
      onRetry: (error, attempt) => {
        this.logger.warn(
          `Connection retry attempt ${attempt}/3: ${
            error instanceof Error ? error.message : String(error)
          }`,
        );
      },
    });
  }

  private async applySchema(): Promise<void> {
    const schema = readFileSync(join(__dirname, 'schema.sql'), 'utf8');
    await this.query(schema);
  }
}
