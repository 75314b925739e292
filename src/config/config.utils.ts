import { Logger } from '@nestjs/common';
import type { MailRelayConfiguration } from './config.types';
import { backoffSchedule } from '../relay/delivery/backoff';

/* c8 ignore start */
/**
 * Log Configuration Summary
 *
 * Logs a summary of the loaded configuration for debugging purposes.
 *
 * @param config - The complete configuration object
 */
export function logConfigurationSummary(config: MailRelayConfiguration): void {
  const summaryLogger = new Logger('Configuration');

  summaryLogger.log(`Environment: ${config.environment}`);
  summaryLogger.log(`HTTP Server: port ${config.main.port}`);
  summaryLogger.log(`Roles: ${config.main.roles.join(', ')}`);

  if (config.main.roles.includes('directory')) {
    summaryLogger.log(`Directory Domains: ${config.directory.domains.join(', ')}`);
  }
  summaryLogger.log(`Directory Client: ${config.directory.url ? `remote (${config.directory.url})` : 'in-process'}`);

  if (config.main.roles.includes('mailbox')) {
    summaryLogger.log(`Mailbox Location: ${config.mailbox.location}`);
    summaryLogger.log(
      `Mailbox Addresses: ${config.mailbox.addresses.length > 0 ? config.mailbox.addresses.join(', ') : 'none'}`,
    );
  }

  if (config.main.roles.includes('relay')) {
    summaryLogger.log(`Relay Transport: ${config.relay.transport}`);
    summaryLogger.log(
      `Relay Retry Policy: ${config.relay.maxRetries} retries, backoff ${config.relay.initialBackoff}ms..${config.relay.maxBackoff}ms`,
    );
    const schedule = backoffSchedule(config.relay);
    summaryLogger.log(`Relay Backoff Schedule: ${schedule.length > 0 ? schedule.map((ms) => `${ms}ms`).join(', ') : 'none'}`);
  }

  summaryLogger.log('Configuration loaded successfully');
}
/* c8 ignore stop */
