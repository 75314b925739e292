import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { MetricsService } from './metrics.service';
import { MetricsResponseDto } from './dto/metrics-response.dto';
import type { Metrics } from './interfaces';

@ApiTags('Metrics')
@Controller('api/metrics')
export class MetricsController {
  constructor(private readonly metricsService: MetricsService) {}

  /**
   * GET /api/metrics
   * Returns directory, mailbox and relay counters plus uptime
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Get Application Metrics',
    description: 'Returns a snapshot of directory, mailbox and relay counters together with server uptime.',
  })
  @ApiResponse({
    status: 200,
    description: 'Metrics retrieved successfully.',
    type: MetricsResponseDto,
  })
  getMetrics(): Readonly<Metrics> {
    return this.metricsService.getMetrics();
  }
}
