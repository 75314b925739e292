export const MAILBOX_EVENTS = {
  MESSAGE_ENQUEUED: 'mailbox.message.enqueued',
  INBOX_DRAINED: 'mailbox.inbox.drained',
} as const;

export interface MessageEnqueuedEvent {
  recipient: string;
  sender: string;
  /** Inbox size after the append */
  pending: number;
}

export interface InboxDrainedEvent {
  address: string;
  count: number;
}
