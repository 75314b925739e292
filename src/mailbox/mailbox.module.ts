import { Module } from '@nestjs/common';
import { MailboxController } from './mailbox.controller';
import { MailboxService } from './mailbox.service';
import { MailboxStorageService } from './storage/mailbox-storage.service';
import { MailboxRegistrationService } from './registration/mailbox-registration.service';

/**
 * Requires the global DirectoryClientModule for startup self-registration.
 */
@Module({
  controllers: [MailboxController],
  providers: [MailboxService, MailboxStorageService, MailboxRegistrationService],
  exports: [MailboxService, MailboxStorageService],
})
export class MailboxModule {}
