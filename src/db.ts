import { Pool, type PoolConfig } from 'pg';
import { existsSync } from 'fs';

function defaultHost(): string {
  // Inside the docker-compose network Postgres is reachable via the service name.
  return existsSync('/.dockerenv') ? 'postgres' : 'localhost';
}

/**
 * Connection pool for the conversation store.
 * DATABASE_URL wins over the individual PG* variables when set.
 */
export function createPool(config?: PoolConfig, env: Record<string, string | undefined> = process.env): Pool {
  const max = parseInt(env.PGPOOL_MAX || '10', 10);

  if (env.DATABASE_URL) {
    return new Pool({ connectionString: env.DATABASE_URL, max, ...config });
  }

  return new Pool({
    host: env.PGHOST || defaultHost(),
    port: parseInt(env.PGPORT || '5432', 10),
    user: env.PGUSER || 'reengage',
    password: env.PGPASSWORD || 'reengage',
    database: env.PGDATABASE || 'reengage',
    max,
    ...config,
  });
}
