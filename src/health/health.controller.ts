import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HealthCheck, HealthCheckService } from '@nestjs/terminus';
import type { HealthIndicatorFunction } from '@nestjs/terminus';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { DirectoryHealthIndicator } from './directory.health';
import { MailboxHealthIndicator } from './mailbox.health';
import { HealthResponseDto } from './dto/health-response.dto';
import type { RelayRole } from '../config/config.constants';

@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly directory: DirectoryHealthIndicator,
    private readonly mailbox: MailboxHealthIndicator,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Server status plus one check per component this node needs: the directory
   * whenever the mailbox or relay role is hosted, the mailbox store when hosted.
   */
  @Get()
  @HealthCheck()
  @ApiOperation({
    summary: 'Get Application Health Status',
    description: 'Reports the server and the directory and mailbox components this node hosts or depends on.',
  })
  @ApiResponse({ status: 200, description: 'All checks passed.', type: HealthResponseDto })
  @ApiResponse({ status: 503, description: 'One or more checks failed.', type: HealthResponseDto })
  check() {
    const roles = this.configService.get<RelayRole[]>('mailrelay.main.roles') ?? [];

    const checks: HealthIndicatorFunction[] = [() => Promise.resolve({ server: { status: 'up', roles } })];
    checks.push(() => this.directory.isHealthy('directory'));
    if (roles.includes('mailbox')) {
      checks.push(() => this.mailbox.isHealthy('mailbox'));
    }

    return this.health.check(checks);
  }
}
