import { ApiProperty } from '@nestjs/swagger';

/**
 * Response for GET /health
 */
export class HealthResponseDto {
  @ApiProperty({ description: 'Overall health status', example: 'ok', enum: ['ok', 'error'] })
  status!: string;

  @ApiProperty({
    description: 'Indicators that are up',
    example: {
      server: { status: 'up', roles: ['directory', 'mailbox', 'relay'] },
      directory: { status: 'up', hosted: true, domains: ['earth.test'], entries: 2 },
      mailbox: { status: 'up', hosted: true, inboxes: 1, pending: 3 },
    },
    required: false,
  })
  info?: Record<string, unknown>;

  @ApiProperty({
    description: 'Indicators that are down',
    example: { directory: { status: 'down', message: 'connect ECONNREFUSED' } },
    required: false,
  })
  error?: Record<string, unknown>;

  @ApiProperty({ description: 'Every indicator, up or down' })
  details!: Record<string, unknown>;
}
