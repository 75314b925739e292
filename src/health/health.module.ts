import { DynamicModule, Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HttpModule } from '@nestjs/axios';
import { HealthController } from './health.controller';
import { DirectoryHealthIndicator } from './directory.health';
import { MailboxHealthIndicator } from './mailbox.health';
import { DirectoryModule } from '../directory/directory.module';
import { MailboxModule } from '../mailbox/mailbox.module';

export interface HealthModuleOptions {
  hostsDirectory: boolean;
  hostsMailbox: boolean;
}

/**
 * Health check endpoint. Hosted components are imported so their indicators
 * can inspect them.
 */
@Module({})
export class HealthModule {
  static forRoot(options: HealthModuleOptions): DynamicModule {
    return {
      module: HealthModule,
      imports: [
        TerminusModule,
        HttpModule,
        ...(options.hostsDirectory ? [DirectoryModule] : []),
        ...(options.hostsMailbox ? [MailboxModule] : []),
      ],
      controllers: [HealthController],
      providers: [DirectoryHealthIndicator, MailboxHealthIndicator],
    };
  }
}
