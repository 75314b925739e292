import { Injectable } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { MetricsService } from './metrics.service';
import { METRIC_PATHS } from './metrics.constants';
import {
  MAILBOX_EVENTS,
  type InboxDrainedEvent,
  type MessageEnqueuedEvent,
} from '../mailbox/events/mailbox.events';

/**
 * Counts mailbox activity published on the application event bus.
 */
@Injectable()
export class MetricsEventsListener {
  constructor(private readonly metricsService: MetricsService) {}

  @OnEvent(MAILBOX_EVENTS.MESSAGE_ENQUEUED)
  handleMessageEnqueued(_event: MessageEnqueuedEvent): void {
    this.metricsService.increment(METRIC_PATHS.MAILBOX_ENQUEUED_TOTAL);
  }

  @OnEvent(MAILBOX_EVENTS.INBOX_DRAINED)
  handleInboxDrained(event: InboxDrainedEvent): void {
    this.metricsService.increment(METRIC_PATHS.MAILBOX_DRAINS_TOTAL);
    this.metricsService.increment(METRIC_PATHS.MAILBOX_DRAINED_TOTAL, event.count);
  }
}
