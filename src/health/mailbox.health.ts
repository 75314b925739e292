import { Injectable, Optional } from '@nestjs/common';
import { HealthIndicatorService } from '@nestjs/terminus';
import type { HealthIndicatorResult } from '@nestjs/terminus';
import { MailboxStorageService } from '../mailbox/storage/mailbox-storage.service';

@Injectable()
export class MailboxHealthIndicator {
  constructor(
    private readonly healthIndicatorService: HealthIndicatorService,
    @Optional() private readonly storageService?: MailboxStorageService,
  ) {}

  isHealthy(key: string): Promise<HealthIndicatorResult> {
    const indicator = this.healthIndicatorService.check(key);
    if (!this.storageService) {
      return Promise.resolve(indicator.up({ hosted: false }));
    }
    return Promise.resolve(
      indicator.up({
        hosted: true,
        inboxes: this.storageService.getInboxCount(),
        pending: this.storageService.getTotalMessageCount(),
      }),
    );
  }
}
