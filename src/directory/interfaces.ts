/**
 * Outcome of a registration. A rejected registration is a business outcome,
 * not an error: `reason` says why.
 */
export interface RegisterResult {
  accepted: boolean;
  reason: string;
}

export interface LookupResult {
  found: boolean;
  /** Empty string when not found */
  location: string;
}
