import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { MailboxStorageService } from './storage/mailbox-storage.service';
import { MAILBOX_EVENTS, type InboxDrainedEvent, type MessageEnqueuedEvent } from './events/mailbox.events';
import type { MailMessage, OperationResult } from '../shared/interfaces/mail-message.interface';

@Injectable()
export class MailboxService {
  private readonly logger = new Logger(MailboxService.name);

  constructor(
    private readonly storageService: MailboxStorageService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Accept a message into its recipient's inbox.
   *
   * @throws {BadRequestException} If the message is missing or has no recipient
   */
  enqueue(message: MailMessage | null | undefined): OperationResult {
    if (!message) {
      throw new BadRequestException('mail message cannot be empty');
    }
    if (!message.recipient) {
      throw new BadRequestException('recipient cannot be empty');
    }

    const pending = this.storageService.append(message);
    this.logger.log(
      `Mailbox for '${message.recipient}': Received new mail from '${message.sender}' (Subject: ${message.subject})`,
    );

    const event: MessageEnqueuedEvent = {
      recipient: message.recipient,
      sender: message.sender,
      pending,
    };
    this.eventEmitter.emit(MAILBOX_EVENTS.MESSAGE_ENQUEUED, event);

    return { success: true, message: 'Mail received successfully' };
  }

  /**
   * Hand out every message waiting for an address, oldest first, and clear the inbox.
   *
   * @throws {BadRequestException} If the address is empty
   */
  drain(address: string): Readonly<MailMessage>[] {
    if (!address) {
      throw new BadRequestException('email address cannot be empty');
    }

    const messages = this.storageService.drain(address);
    if (messages.length === 0) {
      this.logger.log(`Mailbox for '${address}': No new mail to retrieve`);
    } else {
      this.logger.log(`Mailbox for '${address}': Retrieved ${messages.length} messages and cleared inbox`);
    }

    const event: InboxDrainedEvent = { address, count: messages.length };
    this.eventEmitter.emit(MAILBOX_EVENTS.INBOX_DRAINED, event);

    return messages;
  }
}
