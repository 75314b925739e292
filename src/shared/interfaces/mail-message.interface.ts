/**
 * A mail message as it travels from sender to mailbox.
 * Created by the sender and never mutated afterwards.
 */
export interface MailMessage {
  sender: string;
  recipient: string;
  subject: string;
  body: string;
  /** Unix timestamp in seconds */
  timestamp: number;
}

/**
 * Business outcome shared by the register, enqueue and send operations.
 * Validation problems are thrown instead of being folded into this shape.
 */
export interface OperationResult {
  success: boolean;
  message: string;
}
