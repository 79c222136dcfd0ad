import { Controller, Get } from '@nestjs/common';
import {
  HealthCheck,
  HealthCheckService,
  TypeOrmHealthIndicator,
} from '@nestjs/terminus';
import type { HealthCheckResult } from '@nestjs/terminus';

/** Database ping budget for the readiness probe, in ms */
const DATABASE_PING_TIMEOUT = 1500;

/**
 * HealthController — probes for the process supervisor, outside the API
 * prefix and without an access policy.
 *
 * - GET /health        → liveness: the process answers HTTP
 * - GET /health/ready  → readiness: the account store's database answers
 */
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly database: TypeOrmHealthIndicator,
  ) {}

  @Get()
  live(): { status: 'ok' } {
    return { status: 'ok' };
  }

  /** 503 with the failing indicator when the database is unreachable. */
  @Get('ready')
  @HealthCheck()
  ready(): Promise<HealthCheckResult> {
    return this.health.check([
      () =>
        this.database.pingCheck('database', {
          timeout: DATABASE_PING_TIMEOUT,
        }),
    ]);
  }
}
