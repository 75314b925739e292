import { Injectable, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HealthIndicatorService, HttpHealthIndicator } from '@nestjs/terminus';
import type { HealthIndicatorResult } from '@nestjs/terminus';
import { DirectoryService } from '../directory/directory.service';

/**
 * Reports the hosted directory, or pings the remote one this node resolves through.
 */
@Injectable()
export class DirectoryHealthIndicator {
  constructor(
    private readonly healthIndicatorService: HealthIndicatorService,
    private readonly http: HttpHealthIndicator,
    private readonly configService: ConfigService,
    @Optional() private readonly directoryService?: DirectoryService,
  ) {}

  isHealthy(key: string): Promise<HealthIndicatorResult> {
    const indicator = this.healthIndicatorService.check(key);

    if (this.directoryService) {
      const domains = this.directoryService.getAuthorizedDomains();
      const details = { hosted: true, domains, entries: this.directoryService.getEntryCount() };
      return Promise.resolve(domains.length > 0 ? indicator.up(details) : indicator.down(details));
    }

    const url = this.configService.get<string>('mailrelay.directory.url');
    if (!url) {
      return Promise.resolve(indicator.down({ hosted: false, configured: false }));
    }
    return this.http.pingCheck(key, `${url.replace(/\/$/, '')}/health`);
  }
}
