import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import {
  HealthCheck,
  HealthCheckResult,
  HealthCheckService,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import { CheckHealthUseCase } from '../../application/use-cases/check-health.use-case';

@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly checkHealthUseCase: CheckHealthUseCase,
  ) {}

  @Get()
  @HealthCheck()
  @ApiOperation({ summary: 'Health check for the contact store' })
  @ApiResponse({ status: 200, description: 'Contact store reachable' })
  @ApiResponse({ status: 503, description: 'Contact store unreachable' })
  check(): Promise<HealthCheckResult> {
    return this.health.check([
      async (): Promise<HealthIndicatorResult> => {
        const status = await this.checkHealthUseCase.execute();
        return { database: { status: status.database ? 'up' : 'down' } };
      },
    ]);
  }
}
