import { DynamicModule, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpModule, HttpService } from '@nestjs/axios';
import { MailboxModule } from '../mailbox.module';
import { MailboxService } from '../mailbox.service';
import { MAILBOX_TRANSPORT, type MailboxTransport } from './mailbox-transport.interface';
import { InProcessMailboxTransport } from './in-process-mailbox.transport';
import { HttpMailboxTransport } from './http-mailbox.transport';
import { DEFAULT_RELAY_DELIVERY_TIMEOUT } from '../../config/config.constants';

export interface MailboxTransportModuleOptions {
  /** Whether this process hosts the mailbox role */
  hostsMailbox: boolean;
}

/**
 * Provides MAILBOX_TRANSPORT according to `mailrelay.relay.transport`.
 */
@Module({})
export class MailboxTransportModule {
  static forRoot(options: MailboxTransportModuleOptions): DynamicModule {
    return {
      module: MailboxTransportModule,
      global: true,
      imports: [HttpModule, ...(options.hostsMailbox ? [MailboxModule] : [])],
      providers: [
        {
          provide: MAILBOX_TRANSPORT,
          inject: [ConfigService, HttpService, { token: MailboxService, optional: true }],
          useFactory: (
            config: ConfigService,
            httpService: HttpService,
            mailboxService?: MailboxService,
          ): MailboxTransport => {
            if (config.get<string>('mailrelay.relay.transport') === 'local') {
              if (!mailboxService) {
                throw new Error('MAILRELAY_RELAY_TRANSPORT=local requires the mailbox role');
              }
              return new InProcessMailboxTransport(mailboxService, config.get<string>('mailrelay.mailbox.location') ?? '');
            }

            const deliveryTimeout =
              config.get<number>('mailrelay.relay.deliveryTimeout') ?? DEFAULT_RELAY_DELIVERY_TIMEOUT;
            return new HttpMailboxTransport(httpService, deliveryTimeout);
          },
        },
      ],
      exports: [MAILBOX_TRANSPORT],
    };
  }
}
