import { Controller, Get } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';

import { FN_HEALTH_GET } from '../functional-ids';
import { LogService } from '../logging/log.service';
import { HealthService, HealthSnapshot } from './health.service';

export interface HealthError {
  code: string;
  message: string;
}

/**
 * Standard result shape for API responses that can fail synchronously.
 */
export interface StandardResult<T> {
  ok: boolean;
  data: T | null;
  error: HealthError | null;
}

@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(
    private readonly healthService: HealthService,
    private readonly logService: LogService,
  ) {}

  /**
   * GET /health
   *
   * Always 200; `ok` says whether the check ran, `data.status` whether the
   * service is healthy.
   */
  @Get()
  @ApiOperation({ summary: 'Liveness and database probe' })
  @ApiOkResponse({ description: '{ ok, data, error } health envelope' })
  async getHealth(): Promise<StandardResult<HealthSnapshot>> {
    try {
      const snapshot = await this.healthService.checkHealth();

      return { ok: true, data: snapshot, error: null };
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);

      this.logService.logSystemEvent('Health check failed', {
        level: 'ERROR',
        functionId: FN_HEALTH_GET,
        metadata: { error: message },
      });

      return {
        ok: false,
        data: null,
        error: { code: 'HEALTH_CHECK_FAILED', message },
      };
    }
  }
}
