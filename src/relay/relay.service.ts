import { BadRequestException, Inject, Injectable, InternalServerErrorException, Logger } from '@nestjs/common';
import { DIRECTORY_CLIENT, type DirectoryClient } from '../directory/client/directory-client.interface';
import type { LookupResult } from '../directory/interfaces';
import {
  MAILBOX_TRANSPORT,
  type MailboxChannel,
  type MailboxTransport,
} from '../mailbox/transport/mailbox-transport.interface';
import { MetricsService } from '../metrics/metrics.service';
import { METRIC_PATHS } from '../metrics/metrics.constants';
import { getRemoteErrorMessage } from '../shared/error.utils';
import type { MailMessage, OperationResult } from '../shared/interfaces/mail-message.interface';
import { CLOCK, type Clock } from './clock/clock.interface';
import { computeBackoff } from './delivery/backoff';
import { DeliveryRun } from './delivery/delivery-run';
import { DeliveryState } from './delivery/delivery-state';
import { RETRY_POLICY, type RetryPolicy } from './interfaces';

/**
 * Resolves a recipient through the directory and delivers to its mailbox,
 * retrying failed attempts with capped exponential backoff.
 */
@Injectable()
export class RelayService {
  private readonly logger = new Logger(RelayService.name);

  constructor(
    @Inject(DIRECTORY_CLIENT) private readonly directoryClient: DirectoryClient,
    @Inject(MAILBOX_TRANSPORT) private readonly transport: MailboxTransport,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(RETRY_POLICY) private readonly policy: RetryPolicy,
    private readonly metricsService: MetricsService,
  ) {}

  /**
   * Send one message to its recipient.
   *
   * Not-found, exhausted and cancelled outcomes are returned with
   * `success=false`; only validation and collaborator failures throw.
   *
   * @param signal - Aborting stops the run at the next backoff boundary
   * @throws {BadRequestException} If the message or its recipient is empty
   * @throws {InternalServerErrorException} If the directory cannot be queried or the mailbox cannot be reached
   */
  async sendMessage(message: MailMessage | null | undefined, signal?: AbortSignal): Promise<OperationResult> {
    const run = new DeliveryRun();

    if (!message) {
      throw new BadRequestException('mail message cannot be empty');
    }
    if (!message.recipient) {
      throw new BadRequestException('recipient email cannot be empty');
    }

    this.metricsService.increment(METRIC_PATHS.RELAY_SENT_TOTAL);
    this.logger.log(
      `Received mail from '${message.sender}' for '${message.recipient}' (Subject: ${message.subject})`,
    );

    run.transition(DeliveryState.Resolving);
    const lookup = await this.resolve(message.recipient);

    if (!lookup.found) {
      run.transition(DeliveryState.NotFound);
      this.metricsService.increment(METRIC_PATHS.RELAY_NOT_FOUND_TOTAL);
      this.logger.warn(`Recipient '${message.recipient}' not found in directory`);
      return { success: false, message: `Recipient '${message.recipient}' not found` };
    }

    this.logger.log(`Found recipient '${message.recipient}' at mailbox '${lookup.location}'`);

    let channel: MailboxChannel;
    try {
      channel = this.transport.open(lookup.location);
    } catch (error) {
      const reason = getRemoteErrorMessage(error);
      this.logger.error(`Could not connect to recipient mailbox at ${lookup.location}: ${reason}`);
      throw new InternalServerErrorException(`failed to connect to recipient mailbox: ${reason}`);
    }

    try {
      return await this.deliver(run, channel, message, signal);
    } finally {
      channel.close();
    }
  }

  private async resolve(recipient: string): Promise<LookupResult> {
    try {
      return await this.directoryClient.lookup(recipient);
    } catch (error) {
      const reason = getRemoteErrorMessage(error);
      this.logger.error(`Error looking up mailbox for '${recipient}': ${reason}`);
      throw new InternalServerErrorException(`failed to lookup recipient mailbox: ${reason}`);
    }
  }

  private async deliver(
    run: DeliveryRun,
    channel: MailboxChannel,
    message: MailMessage,
    signal?: AbortSignal,
  ): Promise<OperationResult> {
    const totalAttempts = this.policy.maxRetries + 1;
    const startedAt = this.clock.now();

    for (;;) {
      const attempt = run.beginAttempt();
      this.metricsService.increment(METRIC_PATHS.RELAY_ATTEMPTS_TOTAL);

      const failure = await this.attempt(channel, message);
      if (failure === undefined) {
        run.transition(DeliveryState.Succeeded);
        this.metricsService.increment(METRIC_PATHS.RELAY_SUCCEEDED_TOTAL);
        this.metricsService.recordDeliveryTime(this.clock.now() - startedAt);
        this.logger.log(
          `Mail delivered to '${message.recipient}' (Mailbox: ${channel.location}) on attempt ${attempt}/${totalAttempts}`,
        );
        return { success: true, message: 'Mail sent successfully' };
      }

      run.recordFailure(failure);
      this.logger.warn(`Delivery attempt ${attempt}/${totalAttempts} to '${message.recipient}' failed: ${failure}`);

      if (attempt >= totalAttempts) {
        run.transition(DeliveryState.Exhausted);
        this.metricsService.increment(METRIC_PATHS.RELAY_EXHAUSTED_TOTAL);
        this.logger.error(
          `Giving up on '${message.recipient}' after ${this.policy.maxRetries} retries: ${run.lastError}`,
        );
        return {
          success: false,
          message: `Mail delivery failed after ${this.policy.maxRetries} retries: ${run.lastError}`,
        };
      }

      run.transition(DeliveryState.Retrying);
      this.metricsService.increment(METRIC_PATHS.RELAY_RETRIES_TOTAL);

      const wait = computeBackoff(attempt, this.policy);
      this.logger.debug(`Retrying '${message.recipient}' in ${wait}ms (retry ${attempt}/${this.policy.maxRetries})`);

      if (!(await this.backoff(wait, signal))) {
        run.transition(DeliveryState.Cancelled);
        this.metricsService.increment(METRIC_PATHS.RELAY_CANCELLED_TOTAL);
        this.logger.warn(`Delivery to '${message.recipient}' cancelled after ${run.attempts} attempts`);
        return {
          success: false,
          message: `Mail delivery cancelled after ${run.attempts} attempts: ${run.lastError}`,
        };
      }
    }
  }

  /**
   * One delivery attempt. Resolves to the failure text, or undefined on success.
   */
  private async attempt(channel: MailboxChannel, message: MailMessage): Promise<string | undefined> {
    try {
      const response = await channel.deliver(message);
      return response.success ? undefined : response.message;
    } catch (error) {
      return getRemoteErrorMessage(error);
    }
  }

  /**
   * Wait out a backoff. Resolves to false when the caller cancelled.
   */
  private async backoff(ms: number, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) {
      return false;
    }
    try {
      await this.clock.sleep(ms, signal);
    } catch (error) {
      if (signal?.aborted) {
        return false;
      }
      throw error;
    }
    return !signal?.aborted;
  }
}
