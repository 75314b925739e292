import { Inject, Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DIRECTORY_CLIENT, type DirectoryClient } from '../../directory/client/directory-client.interface';
import { getRemoteErrorMessage } from '../../shared/error.utils';

export interface RegistrationSummary {
  registered: string[];
  rejected: string[];
  failed: string[];
}

/**
 * Announces the addresses hosted by this mailbox to the directory once the
 * application has booted. Failures are logged and never stop the node.
 */
@Injectable()
export class MailboxRegistrationService implements OnApplicationBootstrap {
  private readonly logger = new Logger(MailboxRegistrationService.name);
  private readonly location: string;
  private readonly addresses: string[];

  constructor(
    configService: ConfigService,
    @Inject(DIRECTORY_CLIENT) private readonly directoryClient: DirectoryClient,
  ) {
    this.location = configService.get<string>('mailrelay.mailbox.location') ?? '';
    this.addresses = configService.get<string[]>('mailrelay.mailbox.addresses') ?? [];
  }

  async onApplicationBootstrap(): Promise<void> {
    if (this.addresses.length === 0) {
      return;
    }
    await this.registerAll();
  }

  /**
   * Register every configured address at this mailbox's location.
   */
  async registerAll(): Promise<RegistrationSummary> {
    const summary: RegistrationSummary = { registered: [], rejected: [], failed: [] };

    for (const address of this.addresses) {
      try {
        const result = await this.directoryClient.register(address, this.location);
        if (result.accepted) {
          summary.registered.push(address);
          this.logger.log(`Successfully registered '${address}' with directory: ${result.reason}`);
        } else {
          summary.rejected.push(address);
          this.logger.error(`Failed to register '${address}' with directory: ${result.reason}`);
        }
      } catch (error) {
        summary.failed.push(address);
        this.logger.error(`Could not register '${address}' with directory: ${getRemoteErrorMessage(error)}`);
      }
    }

    return summary;
  }
}
