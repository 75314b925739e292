import { Injectable, Logger } from '@nestjs/common';
import type { MailMessage } from '../../shared/interfaces/mail-message.interface';

/**
 * In-memory inboxes keyed by recipient address.
 *
 * Each method completes synchronously, which makes append and drain on the
 * same recipient mutually exclusive without an explicit lock.
 */
@Injectable()
export class MailboxStorageService {
  private readonly logger = new Logger(MailboxStorageService.name);
  private readonly inboxes = new Map<string, Readonly<MailMessage>[]>(); // Map<recipient, messages in arrival order>

  /**
   * Append a message to the recipient's inbox, creating the inbox if needed.
   * The stored copy is frozen so the caller's object can change without touching the inbox.
   *
   * @returns Number of messages now waiting in the inbox
   */
  append(message: MailMessage): number {
    const stored: Readonly<MailMessage> = Object.freeze({
      sender: message.sender,
      recipient: message.recipient,
      subject: message.subject,
      body: message.body,
      timestamp: message.timestamp,
    });

    const inbox = this.inboxes.get(stored.recipient);
    if (inbox) {
      inbox.push(stored);
      return inbox.length;
    }

    this.inboxes.set(stored.recipient, [stored]);
    return 1;
  }

  /**
   * Take every message waiting for an address and leave the inbox empty.
   */
  drain(address: string): Readonly<MailMessage>[] {
    const inbox = this.inboxes.get(address);
    if (!inbox) {
      return [];
    }

    this.inboxes.delete(address);
    return inbox;
  }

  /**
   * Number of messages waiting for an address, without draining them.
   */
  getPendingCount(address: string): number {
    return this.inboxes.get(address)?.length ?? 0;
  }

  /**
   * Number of inboxes currently holding mail
   */
  getInboxCount(): number {
    return this.inboxes.size;
  }

  /**
   * Total number of messages waiting across all inboxes
   */
  getTotalMessageCount(): number {
    let total = 0;
    for (const inbox of this.inboxes.values()) {
      total += inbox.length;
    }
    return total;
  }

  /**
   * Remove every inbox (primarily for testing/maintenance)
   */
  clearAllInboxes(): number {
    const count = this.inboxes.size;
    this.inboxes.clear();
    this.logger.warn(`All inboxes cleared, removed ${count}`);
    return count;
  }
}
