export interface ParsedAddress {
  localPart: string;
  domain: string;
}

/**
 * Splits `local-part@domain` on its single `@`.
 *
 * @returns The two halves, or undefined when the address does not contain
 * exactly one `@` or either half is empty
 */
export function parseAddress(address: string): ParsedAddress | undefined {
  const parts = address.split('@');
  if (parts.length !== 2) {
    return undefined;
  }

  const [localPart, domain] = parts;
  if (!localPart || !domain) {
    return undefined;
  }

  return { localPart, domain };
}
