import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { sql } from 'drizzle-orm';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import { AppConfigService } from '../app/app-config.service';
import * as schema from './schema';

export type Database = NodePgDatabase<typeof schema>;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Tries `connect` up to `retries` times, waiting `delayMs` between attempts. */
export async function connectWithRetry(
  connect: () => Promise<void>,
  retries: number,
  delayMs: number,
  wait: (ms: number) => Promise<void> = sleep,
): Promise<void> {
  let lastError: unknown;
  for (let attempt = 1; attempt <= retries; attempt++) {
    try {
      await connect();
      return;
    } catch (err) {
      lastError = err;
      // Give Postgres a moment to come up (especially when using docker compose).
      if (attempt < retries) await wait(delayMs);
    }
  }

  throw new Error(
    `Could not connect to the database after ${retries} attempts. ` +
      `Is Postgres running and is DATABASE_URL correct?\n` +
      `Last error: ${lastError instanceof Error ? lastError.message : String(lastError)}`,
  );
}

/**
 * Owns the pg pool shared by both listeners. Every drizzle query checks a client
 * out of the pool and hands it back when the query settles, including on error.
 */
@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  readonly pool: Pool;
  readonly db: Database;

  constructor(private readonly appConfig: AppConfigService) {
    this.pool = new Pool({
      connectionString: appConfig.databaseUrl(),
      max: appConfig.databasePoolMax(),
    });
    // Idle clients can error out when the server drops them; the pool replaces them.
    this.pool.on('error', (err) => this.logger.error(`[pg] idle client error: ${err.message}`));
    this.db = drizzle(this.pool, { schema });
  }

  async onModuleInit() {
    await connectWithRetry(
      async () => {
        const client = await this.pool.connect();
        client.release();
      },
      this.appConfig.databaseConnectRetries(),
      this.appConfig.databaseConnectRetryDelayMs(),
    );
  }

  async onModuleDestroy() {
    await this.pool.end();
  }

  /** Round-trip latency of a trivial query, in milliseconds. */
  async ping(): Promise<number> {
    const startedAt = Date.now();
    await this.db.execute(sql`SELECT 1`);
    return Date.now() - startedAt;
  }
}
