/**
 * @interface Metrics
 * @description Counters tracked by the relay components. Groups for roles that
 * are not hosted by the process simply stay at zero.
 */
export interface Metrics {
  /**
   * @property {object} directory - Directory service metrics
   */
  directory: {
    /** Registrations accepted (new or updated entries) */
    registrations_total: number;
    /** Registrations rejected because the domain is not managed here */
    registrations_rejected: number;
    /** Lookups served */
    lookups_total: number;
    /** Lookups for addresses without an entry */
    lookups_not_found: number;
  };

  /**
   * @property {object} mailbox - Mailbox store metrics
   */
  mailbox: {
    /** Messages appended to an inbox */
    enqueued_total: number;
    /** Drain operations served, including empty ones */
    drains_total: number;
    /** Messages handed out by drains */
    drained_total: number;
  };

  /**
   * @property {object} relay - Transfer relay metrics
   */
  relay: {
    /** SendMessage calls that passed validation */
    sent_total: number;
    succeeded_total: number;
    not_found_total: number;
    exhausted_total: number;
    cancelled_total: number;
    /** Delivery attempts, first tries and retries alike */
    attempts_total: number;
    retries_total: number;
    /** Running average of successful deliveries, resolution included */
    delivery_time_ms: number;
  };

  server: {
    uptime_seconds: number;
  };
}
