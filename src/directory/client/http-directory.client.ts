import { Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom, timeout } from 'rxjs';
import type { LookupResult, RegisterResult } from '../interfaces';
import type { DirectoryClient } from './directory-client.interface';

function isLookupResult(data: unknown): data is LookupResult {
  return (
    typeof data === 'object' &&
    data !== null &&
    'found' in data &&
    typeof data.found === 'boolean' &&
    'location' in data &&
    typeof data.location === 'string'
  );
}

function isRegisterResponse(data: unknown): data is { success: boolean; message: string } {
  return (
    typeof data === 'object' &&
    data !== null &&
    'success' in data &&
    typeof data.success === 'boolean' &&
    'message' in data &&
    typeof data.message === 'string'
  );
}

/**
 * Reaches a directory hosted by another node through its HTTP API.
 * Transport and HTTP errors propagate to the caller unchanged.
 */
export class HttpDirectoryClient implements DirectoryClient {
  private readonly logger = new Logger(HttpDirectoryClient.name);
  private readonly baseUrl: string;

  constructor(
    private readonly httpService: HttpService,
    baseUrl: string,
    private readonly requestTimeout: number,
  ) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
  }

  async lookup(address: string): Promise<LookupResult> {
    const url = `${this.baseUrl}/api/directory/entries/${encodeURIComponent(address)}`;
    const response = await firstValueFrom(
      this.httpService
        .get<unknown>(url, { timeout: this.requestTimeout })
        .pipe(timeout(this.requestTimeout)),
    );

    if (!isLookupResult(response.data)) {
      throw new Error(`Malformed lookup response from directory at ${this.baseUrl}`);
    }
    return { found: response.data.found, location: response.data.location };
  }

  async register(address: string, location: string): Promise<RegisterResult> {
    this.logger.debug(`Registering '${address}' with directory at ${this.baseUrl}`);
    const response = await firstValueFrom(
      this.httpService
        .post<unknown>(`${this.baseUrl}/api/directory/entries`, { address, location }, { timeout: this.requestTimeout })
        .pipe(timeout(this.requestTimeout)),
    );

    if (!isRegisterResponse(response.data)) {
      throw new Error(`Malformed registration response from directory at ${this.baseUrl}`);
    }
    return { accepted: response.data.success, reason: response.data.message };
  }
}
