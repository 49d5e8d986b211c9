import type { Pool } from 'pg';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthCheckResult {
  status: HealthStatus;
  latency_ms: number;
  details?: Record<string, unknown>;
}

export interface HealthChecker {
  name: string;
  critical: boolean;
  check(): Promise<HealthCheckResult>;
}

export interface HealthResponse {
  status: HealthStatus;
  timestamp: string;
  components: Record<string, HealthCheckResult>;
}

const REQUIRED_TABLES = ['contact', 'service_customer', 'conversation_turn', 'webhook_rejection', 'campaign_run'];

export class DatabaseHealthChecker implements HealthChecker {
  readonly name = 'database';
  readonly critical = true;

  constructor(private pool: Pool) {}

  async check(): Promise<HealthCheckResult> {
    const start = Date.now();
    try {
      const result = await this.pool.query<{ table_name: string }>(
        `SELECT t AS table_name FROM unnest($1::text[]) AS t WHERE to_regclass(t) IS NULL`,
        [REQUIRED_TABLES],
      );
      const missing = result.rows.map((row) => row.table_name);

      return {
        status: missing.length > 0 ? 'unhealthy' : 'healthy',
        latency_ms: Date.now() - start,
        details: {
          pool_total: this.pool.totalCount,
          pool_idle: this.pool.idleCount,
          pool_waiting: this.pool.waitingCount,
          ...(missing.length > 0 ? { missing_tables: missing } : {}),
        },
      };
    } catch {
      return {
        status: 'unhealthy',
        latency_ms: Date.now() - start,
        details: { error: 'Database connection failed' },
      };
    }
  }
}

/**
 * Reports the outbound mode. Staging (outbound disabled) is a legitimate mode,
 * reported as degraded so it is visible on dashboards.
 */
export class OutboundHealthChecker implements HealthChecker {
  readonly name = 'outbound';
  readonly critical = false;

  constructor(
    private readonly outboundEnabled: boolean,
    private readonly gatewayConfigured: boolean,
  ) {}

  async check(): Promise<HealthCheckResult> {
    const mode = this.outboundEnabled ? 'live' : 'suppressed';
    return {
      status: this.outboundEnabled && this.gatewayConfigured ? 'healthy' : 'degraded',
      latency_ms: 0,
      details: { mode, gateway_configured: this.gatewayConfigured },
    };
  }
}

export class HealthCheckRegistry {
  private checkers: HealthChecker[] = [];

  register(checker: HealthChecker): void {
    this.checkers.push(checker);
  }

  async checkAll(): Promise<HealthResponse> {
    const components: Record<string, HealthCheckResult> = {};
    let overallStatus: HealthStatus = 'healthy';

    const results = await Promise.all(this.checkers.map(async (checker) => ({ checker, result: await checker.check() })));

    for (const { checker, result } of results) {
      components[checker.name] = result;

      if (result.status === 'unhealthy' && checker.critical) {
        overallStatus = 'unhealthy';
      } else if (result.status !== 'healthy' && overallStatus === 'healthy') {
        overallStatus = 'degraded';
      }
    }

    return {
      status: overallStatus,
      timestamp: new Date().toISOString(),
      components,
    };
  }

  async isReady(): Promise<boolean> {
    for (const checker of this.checkers) {
      if (!checker.critical) continue;
      const result = await checker.check();
      if (result.status === 'unhealthy') return false;
    }
    return true;
  }
}
