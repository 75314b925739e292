import type { LookupResult, RegisterResult } from '../interfaces';

export const DIRECTORY_CLIENT = Symbol('DIRECTORY_CLIENT');

/**
 * How other components reach the directory. The in-process and HTTP
 * implementations honour the same contract, including rejecting invalid
 * input instead of returning a business outcome.
 */
export interface DirectoryClient {
  lookup(address: string): Promise<LookupResult>;
  register(address: string, location: string): Promise<RegisterResult>;
}
