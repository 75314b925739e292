import { Test, TestingModule } from '@nestjs/testing';
import { EventEmitter2, EventEmitterModule } from '@nestjs/event-emitter';
import { MetricsEventsListener } from '../metrics-events.listener';
import { MetricsService } from '../metrics.service';
import { MAILBOX_EVENTS, type InboxDrainedEvent, type MessageEnqueuedEvent } from '../../mailbox/events/mailbox.events';

describe('MetricsEventsListener', () => {
  let module: TestingModule;
  let eventEmitter: EventEmitter2;
  let metricsService: MetricsService;

  beforeEach(async () => {
    module = await Test.createTestingModule({
      imports: [EventEmitterModule.forRoot()],
      providers: [MetricsService, MetricsEventsListener],
    }).compile();
    await module.init();

    eventEmitter = module.get(EventEmitter2);
    metricsService = module.get(MetricsService);
  });

  afterEach(async () => {
    await module.close();
  });

  it('should count enqueued messages', () => {
    const event: MessageEnqueuedEvent = { recipient: 'bob@saturn.test', sender: 'alice@earth.test', pending: 1 };

    eventEmitter.emit(MAILBOX_EVENTS.MESSAGE_ENQUEUED, event);
    eventEmitter.emit(MAILBOX_EVENTS.MESSAGE_ENQUEUED, event);

    expect(metricsService.getMetrics().mailbox.enqueued_total).toBe(2);
  });

  it('should count drains and the messages they returned', () => {
    const drained: InboxDrainedEvent = { address: 'bob@saturn.test', count: 3 };
    const empty: InboxDrainedEvent = { address: 'bob@saturn.test', count: 0 };

    eventEmitter.emit(MAILBOX_EVENTS.INBOX_DRAINED, drained);
    eventEmitter.emit(MAILBOX_EVENTS.INBOX_DRAINED, empty);

    expect(metricsService.getMetrics().mailbox).toEqual({ enqueued_total: 0, drains_total: 2, drained_total: 3 });
  });
});
