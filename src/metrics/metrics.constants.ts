export const METRIC_PATHS = {
  // Directory
  DIRECTORY_REGISTRATIONS_TOTAL: 'directory.registrations_total',
  DIRECTORY_REGISTRATIONS_REJECTED: 'directory.registrations_rejected',
  DIRECTORY_LOOKUPS_TOTAL: 'directory.lookups_total',
  DIRECTORY_LOOKUPS_NOT_FOUND: 'directory.lookups_not_found',

  // Mailbox
  MAILBOX_ENQUEUED_TOTAL: 'mailbox.enqueued_total',
  MAILBOX_DRAINS_TOTAL: 'mailbox.drains_total',
  MAILBOX_DRAINED_TOTAL: 'mailbox.drained_total',

  // Relay
  RELAY_SENT_TOTAL: 'relay.sent_total',
  RELAY_SUCCEEDED_TOTAL: 'relay.succeeded_total',
  RELAY_NOT_FOUND_TOTAL: 'relay.not_found_total',
  RELAY_EXHAUSTED_TOTAL: 'relay.exhausted_total',
  RELAY_CANCELLED_TOTAL: 'relay.cancelled_total',
  RELAY_ATTEMPTS_TOTAL: 'relay.attempts_total',
  RELAY_RETRIES_TOTAL: 'relay.retries_total',
} as const;

export type MetricPath = (typeof METRIC_PATHS)[keyof typeof METRIC_PATHS];
