import { registerAs } from '@nestjs/config';
import * as process from 'process';
import {
  DEFAULT_SERVER_PORT,
  DEFAULT_DIRECTORY_LOOKUP_TIMEOUT,
  DEFAULT_RELAY_MAX_RETRIES,
  DEFAULT_RELAY_INITIAL_BACKOFF,
  DEFAULT_RELAY_MAX_BACKOFF,
  DEFAULT_RELAY_DELIVERY_TIMEOUT,
  type RelayRole,
} from './config/config.constants';
import {
  parseNumberWithDefault,
  parseStringWithDefault,
  parseCommaList,
  parseDirectoryDomains,
  parseRoles,
  parseRelayTransport,
} from './config/config.parsers';
import { isValidHttpUrl, validateRetryPolicy } from './config/config.validators';
import type { MailRelayConfiguration } from './config/config.types';

/**
 * Build Main Server Configuration
 *
 * Optional environment variables:
 * - MAILRELAY_SERVER_PORT: HTTP server port (default: 3000)
 * - MAILRELAY_ROLES: Comma-separated components hosted by this process (default: directory,mailbox,relay)
 */
function buildMainConfig() {
  return {
    port: parseNumberWithDefault(process.env.MAILRELAY_SERVER_PORT, DEFAULT_SERVER_PORT),
    roles: parseRoles(process.env.MAILRELAY_ROLES),
  };
}

/**
 * Build Directory Configuration
 *
 * The authorized domain set is only required when this process hosts the
 * directory. Processes that do not host it must point at a remote one.
 *
 * Environment variables:
 * - MAILRELAY_DIRECTORY_DOMAINS: Comma-separated authorized domains (required with the directory role)
 * - MAILRELAY_DIRECTORY_URL: Base URL of a remote directory node (default: in-process directory)
 * - MAILRELAY_DIRECTORY_LOOKUP_TIMEOUT: Timeout for directory calls in ms (default: 5000)
 *
 * @throws {Error} If no directory is reachable or the remote URL is malformed
 */
function buildDirectoryConfig(roles: RelayRole[]) {
  const hostsDirectory = roles.includes('directory');
  const url = process.env.MAILRELAY_DIRECTORY_URL?.trim() || undefined;

  if (url && !isValidHttpUrl(url)) {
    throw new Error(`Invalid MAILRELAY_DIRECTORY_URL: "${url}" (must be an http or https URL)`);
  }

  if (!url && !hostsDirectory) {
    throw new Error(
      'This process does not host the directory role. Either:\n' +
        '  1. Add "directory" to MAILRELAY_ROLES\n' +
        '  2. Point at a remote directory: MAILRELAY_DIRECTORY_URL',
    );
  }

  return {
    domains: hostsDirectory ? parseDirectoryDomains() : [],
    url,
    lookupTimeout: parseNumberWithDefault(
      process.env.MAILRELAY_DIRECTORY_LOOKUP_TIMEOUT,
      DEFAULT_DIRECTORY_LOOKUP_TIMEOUT,
    ),
  };
}

/**
 * Build Mailbox Configuration
 *
 * Environment variables:
 * - MAILRELAY_MAILBOX_LOCATION: Location advertised to the directory (default: http://localhost:<port>)
 * - MAILRELAY_MAILBOX_ADDRESSES: Comma-separated addresses registered with the directory at startup
 */
function buildMailboxConfig(port: number) {
  return {
    location: parseStringWithDefault(process.env.MAILRELAY_MAILBOX_LOCATION?.trim(), `http://localhost:${port}`),
    addresses: parseCommaList(process.env.MAILRELAY_MAILBOX_ADDRESSES),
  };
}

/**
 * Build Relay Configuration
 *
 * Environment variables:
 * - MAILRELAY_RELAY_TRANSPORT: 'http' or 'local' (default: http)
 * - MAILRELAY_RELAY_MAX_RETRIES: Retries after the first attempt (default: 3)
 * - MAILRELAY_RELAY_INITIAL_BACKOFF: First backoff in ms (default: 100)
 * - MAILRELAY_RELAY_MAX_BACKOFF: Backoff cap in ms (default: 2000)
 * - MAILRELAY_RELAY_DELIVERY_TIMEOUT: Timeout per delivery attempt in ms (default: 5000)
 *
 * @throws {Error} If the local transport is selected without hosting the mailbox, or the backoff bounds are inverted
 */
function buildRelayConfig(roles: RelayRole[]) {
  const transport = parseRelayTransport(process.env.MAILRELAY_RELAY_TRANSPORT);

  if (roles.includes('relay') && transport === 'local' && !roles.includes('mailbox')) {
    throw new Error('MAILRELAY_RELAY_TRANSPORT=local requires the mailbox role in MAILRELAY_ROLES');
  }

  const initialBackoff = parseNumberWithDefault(
    process.env.MAILRELAY_RELAY_INITIAL_BACKOFF,
    DEFAULT_RELAY_INITIAL_BACKOFF,
  );
  const maxBackoff = parseNumberWithDefault(process.env.MAILRELAY_RELAY_MAX_BACKOFF, DEFAULT_RELAY_MAX_BACKOFF);
  validateRetryPolicy(initialBackoff, maxBackoff);

  return {
    transport,
    maxRetries: parseNumberWithDefault(process.env.MAILRELAY_RELAY_MAX_RETRIES, DEFAULT_RELAY_MAX_RETRIES),
    initialBackoff,
    maxBackoff,
    deliveryTimeout: parseNumberWithDefault(
      process.env.MAILRELAY_RELAY_DELIVERY_TIMEOUT,
      DEFAULT_RELAY_DELIVERY_TIMEOUT,
    ),
  };
}

/**
 * Register Config mailrelay
 */
export default registerAs('mailrelay', (): MailRelayConfiguration => {
  const main = buildMainConfig();

  return {
    environment: parseStringWithDefault(process.env.NODE_ENV, 'production'),
    main,
    directory: buildDirectoryConfig(main.roles),
    mailbox: buildMailboxConfig(main.port),
    relay: buildRelayConfig(main.roles),
  };
});
