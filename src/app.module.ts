import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import appConfig from './app.config';
import { parseRoles } from './config/config.parsers';
import { HealthModule } from './health/health.module';
import { MetricsModule } from './metrics/metrics.module';
import { DirectoryModule } from './directory/directory.module';
import { DirectoryClientModule } from './directory/client/directory-client.module';
import { MailboxModule } from './mailbox/mailbox.module';
import { MailboxTransportModule } from './mailbox/transport/mailbox-transport.module';
import { RelayModule } from './relay/relay.module';

// Conditional module loading based on the roles this process hosts
const roles = parseRoles(process.env.MAILRELAY_ROLES);
const hostsDirectory = roles.includes('directory');
const hostsMailbox = roles.includes('mailbox');
const hostsRelay = roles.includes('relay');

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig],
    }),
    EventEmitterModule.forRoot(),
    MetricsModule,
    HealthModule.forRoot({ hostsDirectory, hostsMailbox }),
    ...(hostsDirectory ? [DirectoryModule] : []),
    // Mailbox registration and the relay both resolve through the directory client
    ...(hostsMailbox || hostsRelay ? [DirectoryClientModule.forRoot({ hostsDirectory })] : []),
    ...(hostsMailbox ? [MailboxModule] : []),
    ...(hostsRelay ? [MailboxTransportModule.forRoot({ hostsMailbox }), RelayModule] : []),
  ],
})
export class AppModule {}
