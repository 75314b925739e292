import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MetricsModule } from '../metrics/metrics.module';
import { RelayController } from './relay.controller';
import { RelayService } from './relay.service';
import { CLOCK } from './clock/clock.interface';
import { SystemClock } from './clock/system-clock';
import { RETRY_POLICY, type RetryPolicy } from './interfaces';
import {
  DEFAULT_RELAY_INITIAL_BACKOFF,
  DEFAULT_RELAY_MAX_BACKOFF,
  DEFAULT_RELAY_MAX_RETRIES,
} from '../config/config.constants';

/**
 * Requires the global DirectoryClientModule and MailboxTransportModule.
 */
@Module({
  imports: [MetricsModule],
  controllers: [RelayController],
  providers: [
    RelayService,
    { provide: CLOCK, useClass: SystemClock },
    {
      provide: RETRY_POLICY,
      inject: [ConfigService],
      useFactory: (config: ConfigService): RetryPolicy => ({
        maxRetries: config.get<number>('mailrelay.relay.maxRetries') ?? DEFAULT_RELAY_MAX_RETRIES,
        initialBackoff: config.get<number>('mailrelay.relay.initialBackoff') ?? DEFAULT_RELAY_INITIAL_BACKOFF,
        maxBackoff: config.get<number>('mailrelay.relay.maxBackoff') ?? DEFAULT_RELAY_MAX_BACKOFF,
      }),
    },
  ],
  exports: [RelayService],
})
export class RelayModule {}
