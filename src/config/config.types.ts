import type { RelayRole, RelayTransport } from './config.constants';

/**
 * Configuration type definition for type-safe access
 */
export interface MailRelayConfiguration {
  environment: string;
  main: {
    port: number;
    roles: RelayRole[];
  };
  directory: {
    /** Authorized domain set; empty when this process does not host the directory */
    domains: string[];
    /** Remote directory base URL; undefined means the in-process directory is used */
    url?: string;
    lookupTimeout: number;
  };
  mailbox: {
    location: string;
    addresses: string[];
  };
  relay: {
    transport: RelayTransport;
    maxRetries: number;
    initialBackoff: number;
    maxBackoff: number;
    deliveryTimeout: number;
  };
}
