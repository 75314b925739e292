import type { DirectoryService } from '../directory.service';
import type { LookupResult, RegisterResult } from '../interfaces';
import type { DirectoryClient } from './directory-client.interface';

/**
 * Calls the directory hosted by this process directly.
 */
export class InProcessDirectoryClient implements DirectoryClient {
  constructor(private readonly directoryService: DirectoryService) {}

  async lookup(address: string): Promise<LookupResult> {
    return this.directoryService.lookup(address);
  }

  async register(address: string, location: string): Promise<RegisterResult> {
    return this.directoryService.register(address, location);
  }
}
