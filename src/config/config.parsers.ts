import * as process from 'process';
import {
  ALLOWED_ROLES,
  ALLOWED_TRANSPORTS,
  DEFAULT_ROLES,
  DEFAULT_RELAY_TRANSPORT,
  type RelayRole,
  type RelayTransport,
} from './config.constants';
import { isValidDomain } from './config.validators';

export function parseNumberWithDefault(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const parsed = Number(value);

  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid numeric value: "${value}" (must be a non-negative finite number)`);
  }

  // Ports, timeouts, retry counts and backoffs are all whole numbers
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid numeric value: "${value}" (must be an integer)`);
  }

  return parsed;
}

/**
 * Parses a string environment variable with a default value.
 *
 * @param value - The string value to parse
 * @param defaultValue - The default value to return if not provided
 * @returns The value or default
 */
export function parseStringWithDefault(value: string | undefined, defaultValue: string): string {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value;
}

/**
 * Splits a comma-separated environment value into trimmed, non-empty items.
 */
export function parseCommaList(value: string | undefined): string[] {
  if (!value || !value.trim()) {
    return [];
  }

  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Parses the domains this directory is authoritative for.
 *
 * Only addresses in these domains can be registered, so an empty list would
 * make the directory reject every registration.
 *
 * Domains are kept as written and matched exactly against the domain part
 * of an address.
 *
 * @throws {Error} If no domains are configured or any of them is malformed
 * @example
 * ```
 * MAILRELAY_DIRECTORY_DOMAINS=earth.com,saturn.com
 * // Returns: ['earth.com', 'saturn.com']
 * ```
 */
export function parseDirectoryDomains(): string[] {
  const domains = parseCommaList(process.env.MAILRELAY_DIRECTORY_DOMAINS);

  if (domains.length === 0) {
    throw new Error(
      'MAILRELAY_DIRECTORY_DOMAINS is required when hosting the directory role. Specify comma-separated domains (e.g., "earth.com,saturn.com")',
    );
  }

  const invalidDomains = domains.filter((d) => !isValidDomain(d));
  if (invalidDomains.length > 0) {
    throw new Error(`Invalid domain format in MAILRELAY_DIRECTORY_DOMAINS: ${invalidDomains.join(', ')}`);
  }

  return domains;
}

function isRelayRole(value: string): value is RelayRole {
  return ALLOWED_ROLES.some((role) => role === value);
}

function isRelayTransport(value: string): value is RelayTransport {
  return ALLOWED_TRANSPORTS.some((transport) => transport === value);
}

/**
 * Parses MAILRELAY_ROLES into the set of components hosted by this process.
 *
 * @throws {Error} If an unknown role is listed
 */
export function parseRoles(value: string | undefined): RelayRole[] {
  const requested = parseCommaList(value).map((role) => role.toLowerCase());
  if (requested.length === 0) {
    return [...DEFAULT_ROLES];
  }

  const roles: RelayRole[] = [];
  for (const role of requested) {
    if (!isRelayRole(role)) {
      throw new Error(`Invalid MAILRELAY_ROLES entry: "${role}". Must be one of: ${ALLOWED_ROLES.join(', ')}`);
    }
    if (!roles.includes(role)) {
      roles.push(role);
    }
  }
  return roles;
}

export function parseRelayTransport(value: string | undefined): RelayTransport {
  const normalized = parseStringWithDefault(value?.trim().toLowerCase(), DEFAULT_RELAY_TRANSPORT);
  if (!isRelayTransport(normalized)) {
    throw new Error(
      `Invalid MAILRELAY_RELAY_TRANSPORT: "${normalized}". Must be one of: ${ALLOWED_TRANSPORTS.join(', ')}`,
    );
  }
  return normalized;
}
