const DOMAIN_LABEL = '[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?';
const DOMAIN_PATTERN = new RegExp(`^${DOMAIN_LABEL}(?:\\.${DOMAIN_LABEL})*$`);

/**
 * Validates domain format against DNS label rules.
 *
 * Single-label names such as `localhost` are accepted.
 */
export function isValidDomain(domain: string): boolean {
  // Matches: localhost, example.com, mail.example.com
  return DOMAIN_PATTERN.test(domain);
}

/**
 * Validates an HTTP(S) base URL used to reach another relay node.
 */
export function isValidHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Validates the retry policy of the transfer relay.
 *
 * @throws {Error} If the maximum backoff is smaller than the initial one
 */
export function validateRetryPolicy(initialBackoff: number, maxBackoff: number): void {
  if (maxBackoff < initialBackoff) {
    throw new Error(
      `MAILRELAY_RELAY_MAX_BACKOFF (${maxBackoff}ms) must be greater than or equal to MAILRELAY_RELAY_INITIAL_BACKOFF (${initialBackoff}ms)`,
    );
  }
}
