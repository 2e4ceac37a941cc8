import { Pool } from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import * as schema from "@shared/schema";

export type Database = NodePgDatabase<typeof schema>;
export type Transaction = Parameters<Parameters<Database["transaction"]>[0]>[0];

let cachedDb: Database | null = null;
let cachedPool: Pool | null = null;

export function getDatabaseUrl(env: NodeJS.ProcessEnv = process.env): string {
  const url = env.DATABASE_URL || env.POSTGRES_URL;
  if (url) {
    return url;
  }

  if (env.PGHOST && env.PGUSER && env.PGDATABASE) {
    const credentials = env.PGPASSWORD
      ? `${encodeURIComponent(env.PGUSER)}:${encodeURIComponent(env.PGPASSWORD)}`
      : encodeURIComponent(env.PGUSER);
    return `postgresql://${credentials}@${env.PGHOST}:${env.PGPORT || '5432'}/${env.PGDATABASE}`;
  }

  throw new Error("No database connection available. Database credentials not found in environment.");
}

export function getDb(): Database {
  if (cachedDb) {
    return cachedDb;
  }

  try {
    let url = getDatabaseUrl();
    const isProduction = process.env.NODE_ENV === 'production';
    const requireSsl = process.env.DATABASE_SSL === 'true';

    let sslConfig: boolean | { rejectUnauthorized: boolean } = false;

    if (requireSsl) {
      if (!url.includes('sslmode=') && !url.includes('ssl=')) {
        const separator = url.includes('?') ? '&' : '?';
        url = `${url}${separator}sslmode=require`;
      }

      sslConfig = { rejectUnauthorized: isProduction };
    }

    cachedPool = new Pool({
      connectionString: url,

      min: isProduction ? 2 : 1,
      max: isProduction ? 15 : 8,

      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,

      statement_timeout: 30000,
      query_timeout: 30000,

      keepAlive: true,
      keepAliveInitialDelayMillis: 10000,

      ...(sslConfig && { ssl: sslConfig })
    });

    cachedPool.on('error', (err) => {
      console.error('[DB_POOL] Unexpected database pool error:', {
        message: err.message,
        stack: err.stack,
        timestamp: new Date().toISOString()
      });
    });

    cachedDb = drizzle(cachedPool, { schema });
    return cachedDb;
  } catch (error) {
    throw new Error(`Failed to connect to database: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }
}

export async function closeDb(): Promise<void> {
  if (cachedPool) {
    const pool = cachedPool;
    cachedPool = null;
    cachedDb = null;
    await pool.end();
    console.log('[DB_POOL] Connection pool closed');
  }
}
