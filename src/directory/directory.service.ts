import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { parseAddress } from '../shared/address.utils';
import { MetricsService } from '../metrics/metrics.service';
import { METRIC_PATHS } from '../metrics/metrics.constants';
import { LookupResult, RegisterResult } from './interfaces';

/**
 * Owns the address → location mapping for the domains this node is
 * authoritative for.
 *
 * Every operation runs to completion synchronously, so a lookup can never
 * interleave with a half-applied registration.
 */
@Injectable()
export class DirectoryService {
  private readonly logger = new Logger(DirectoryService.name);
  private readonly entries = new Map<string, string>(); // Map<address, location>
  private readonly authorizedDomains: ReadonlySet<string>;

  constructor(
    configService: ConfigService,
    private readonly metricsService: MetricsService,
  ) {
    const domains = configService.get<string[]>('mailrelay.directory.domains') ?? [];
    this.authorizedDomains = new Set(domains);
  }

  /**
   * Register (or re-register) the location of an address.
   *
   * @throws {BadRequestException} If either argument is empty or the address is malformed
   */
  register(address: string, location: string): RegisterResult {
    if (!address || !location) {
      throw new BadRequestException('email address and mailbox address cannot be empty');
    }

    const parsed = parseAddress(address);
    if (!parsed) {
      throw new BadRequestException(`invalid email address format: ${address}`);
    }

    if (!this.isAuthoritativeFor(parsed.domain)) {
      this.metricsService.increment(METRIC_PATHS.DIRECTORY_REGISTRATIONS_REJECTED);
      this.logger.warn(
        `Registration rejected for '${address}'. Domain '${parsed.domain}' is not managed by this Nameserver.`,
      );
      return {
        accepted: false,
        reason: `Domain '${parsed.domain}' is not managed by this Nameserver.`,
      };
    }

    const previous = this.entries.get(address);
    this.entries.set(address, location);
    this.metricsService.increment(METRIC_PATHS.DIRECTORY_REGISTRATIONS_TOTAL);

    if (previous !== undefined) {
      this.logger.log(`Address '${address}' already registered, updated location '${previous}' -> '${location}'`);
    } else {
      this.logger.log(`Registered address '${address}' at location '${location}'`);
    }

    return { accepted: true, reason: 'Mailbox registered successfully' };
  }

  /**
   * Resolve an address to its mailbox location.
   *
   * @throws {BadRequestException} If the address is empty
   */
  lookup(address: string): LookupResult {
    if (!address) {
      throw new BadRequestException('email address cannot be empty');
    }

    this.metricsService.increment(METRIC_PATHS.DIRECTORY_LOOKUPS_TOTAL);

    const location = this.entries.get(address);
    if (location === undefined) {
      this.metricsService.increment(METRIC_PATHS.DIRECTORY_LOOKUPS_NOT_FOUND);
      this.logger.log(`Mailbox for '${address}' not found`);
      return { found: false, location: '' };
    }

    this.logger.debug(`Found mailbox for '${address}' at '${location}'`);
    return { found: true, location };
  }

  isAuthoritativeFor(domain: string): boolean {
    return this.authorizedDomains.has(domain);
  }

  getAuthorizedDomains(): string[] {
    return Array.from(this.authorizedDomains);
  }

  getEntryCount(): number {
    return this.entries.size;
  }
}
