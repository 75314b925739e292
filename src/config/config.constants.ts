/**
 * Components a single process can host.
 * A process hosting all three behaves as a self-contained relay.
 */
export const ALLOWED_ROLES = ['directory', 'mailbox', 'relay'] as const;
export type RelayRole = (typeof ALLOWED_ROLES)[number];

/**
 * How the transfer relay reaches a resolved mailbox location.
 */
export const ALLOWED_TRANSPORTS = ['http', 'local'] as const;
export type RelayTransport = (typeof ALLOWED_TRANSPORTS)[number];

// Configuration defaults
export const DEFAULT_SERVER_PORT = 3000;
export const DEFAULT_ROLES: RelayRole[] = ['directory', 'mailbox', 'relay'];
export const DEFAULT_DIRECTORY_LOOKUP_TIMEOUT = 5000;
export const DEFAULT_RELAY_TRANSPORT: RelayTransport = 'http';
export const DEFAULT_RELAY_MAX_RETRIES = 3;
export const DEFAULT_RELAY_INITIAL_BACKOFF = 100; // ms
export const DEFAULT_RELAY_MAX_BACKOFF = 2000; // ms
export const DEFAULT_RELAY_DELIVERY_TIMEOUT = 5000; // ms
