import type { MailMessage } from '../../shared/interfaces/mail-message.interface';

export const MAILBOX_TRANSPORT = Symbol('MAILBOX_TRANSPORT');

/**
 * Reply of a mailbox to a delivery. `success=false` is an explicit refusal,
 * as opposed to a thrown transport error.
 */
export interface DeliveryResponse {
  success: boolean;
  message: string;
}

/**
 * A connection to one mailbox location, reused for every attempt of a send.
 */
export interface MailboxChannel {
  readonly location: string;
  deliver(message: MailMessage): Promise<DeliveryResponse>;
  close(): void;
}

export interface MailboxTransport {
  /**
   * @throws {Error} If no channel can be established to the location
   */
  open(location: string): MailboxChannel;
}
