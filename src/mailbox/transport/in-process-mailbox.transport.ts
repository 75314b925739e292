import { Logger } from '@nestjs/common';
import type { MailboxService } from '../mailbox.service';
import type { MailMessage } from '../../shared/interfaces/mail-message.interface';
import type { DeliveryResponse, MailboxChannel, MailboxTransport } from './mailbox-transport.interface';

class InProcessMailboxChannel implements MailboxChannel {
  constructor(
    readonly location: string,
    private readonly mailboxService: MailboxService,
  ) {}

  async deliver(message: MailMessage): Promise<DeliveryResponse> {
    return this.mailboxService.enqueue(message);
  }

  close(): void {}
}

/**
 * Delivers to the mailbox hosted by this process, whatever location the
 * directory returned. Used when every role runs in one process.
 */
export class InProcessMailboxTransport implements MailboxTransport {
  private readonly logger = new Logger(InProcessMailboxTransport.name);

  constructor(
    private readonly mailboxService: MailboxService,
    private readonly ownLocation: string,
  ) {}

  open(location: string): MailboxChannel {
    if (location !== this.ownLocation) {
      this.logger.debug(`Location '${location}' routed to the local mailbox (advertised as '${this.ownLocation}')`);
    }
    return new InProcessMailboxChannel(location, this.mailboxService);
  }
}
