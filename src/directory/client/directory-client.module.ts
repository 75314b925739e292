import { DynamicModule, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpModule, HttpService } from '@nestjs/axios';
import { DirectoryModule } from '../directory.module';
import { DirectoryService } from '../directory.service';
import { DIRECTORY_CLIENT, type DirectoryClient } from './directory-client.interface';
import { InProcessDirectoryClient } from './in-process-directory.client';
import { HttpDirectoryClient } from './http-directory.client';
import { DEFAULT_DIRECTORY_LOOKUP_TIMEOUT } from '../../config/config.constants';

export interface DirectoryClientModuleOptions {
  /** Whether this process hosts the directory role */
  hostsDirectory: boolean;
}

/**
 * Provides DIRECTORY_CLIENT application-wide. A configured
 * `mailrelay.directory.url` selects the HTTP client; otherwise the directory
 * hosted by this process is called directly.
 */
@Module({})
export class DirectoryClientModule {
  static forRoot(options: DirectoryClientModuleOptions): DynamicModule {
    return {
      module: DirectoryClientModule,
      global: true,
      imports: [HttpModule, ...(options.hostsDirectory ? [DirectoryModule] : [])],
      providers: [
        {
          provide: DIRECTORY_CLIENT,
          inject: [ConfigService, HttpService, { token: DirectoryService, optional: true }],
          useFactory: (
            config: ConfigService,
            httpService: HttpService,
            directoryService?: DirectoryService,
          ): DirectoryClient => {
            const url = config.get<string>('mailrelay.directory.url');
            if (url) {
              const lookupTimeout =
                config.get<number>('mailrelay.directory.lookupTimeout') ?? DEFAULT_DIRECTORY_LOOKUP_TIMEOUT;
              return new HttpDirectoryClient(httpService, url, lookupTimeout);
            }
            if (!directoryService) {
              throw new Error('No directory available: set MAILRELAY_DIRECTORY_URL or host the directory role');
            }
            return new InProcessDirectoryClient(directoryService);
          },
        },
      ],
      exports: [DIRECTORY_CLIENT],
    };
  }
}
