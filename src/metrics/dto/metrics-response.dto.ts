import { ApiProperty } from '@nestjs/swagger';

/**
 * Directory service metrics
 */
export class DirectoryMetricsDto {
  @ApiProperty({ description: 'Registrations accepted', example: 12 })
  registrations_total!: number;

  @ApiProperty({ description: 'Registrations rejected for unmanaged domains', example: 1 })
  registrations_rejected!: number;

  @ApiProperty({ description: 'Lookups served', example: 40 })
  lookups_total!: number;

  @ApiProperty({ description: 'Lookups for unknown addresses', example: 3 })
  lookups_not_found!: number;
}

/**
 * Mailbox store metrics
 */
export class MailboxMetricsDto {
  @ApiProperty({ description: 'Messages appended to inboxes', example: 37 })
  enqueued_total!: number;

  @ApiProperty({ description: 'Drain operations served', example: 9 })
  drains_total!: number;

  @ApiProperty({ description: 'Messages handed out by drains', example: 30 })
  drained_total!: number;
}

/**
 * Transfer relay metrics
 */
export class RelayMetricsDto {
  @ApiProperty({ description: 'Send calls that passed validation', example: 40 })
  sent_total!: number;

  @ApiProperty({ description: 'Deliveries that succeeded', example: 36 })
  succeeded_total!: number;

  @ApiProperty({ description: 'Sends to unregistered recipients', example: 3 })
  not_found_total!: number;

  @ApiProperty({ description: 'Sends that exhausted every retry', example: 1 })
  exhausted_total!: number;

  @ApiProperty({ description: 'Sends abandoned because the caller went away', example: 0 })
  cancelled_total!: number;

  @ApiProperty({ description: 'Delivery attempts made', example: 45 })
  attempts_total!: number;

  @ApiProperty({ description: 'Attempts that were retries', example: 8 })
  retries_total!: number;

  @ApiProperty({ description: 'Average duration of successful deliveries in milliseconds', example: 14 })
  delivery_time_ms!: number;
}

export class ServerMetricsDto {
  @ApiProperty({ description: 'Seconds since the process started', example: 3600 })
  uptime_seconds!: number;
}

export class MetricsResponseDto {
  @ApiProperty({ type: DirectoryMetricsDto })
  directory!: DirectoryMetricsDto;

  @ApiProperty({ type: MailboxMetricsDto })
  mailbox!: MailboxMetricsDto;

  @ApiProperty({ type: RelayMetricsDto })
  relay!: RelayMetricsDto;

  @ApiProperty({ type: ServerMetricsDto })
  server!: ServerMetricsDto;
}
