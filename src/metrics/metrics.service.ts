import { Injectable } from '@nestjs/common';
import { METRIC_PATHS, type MetricPath } from './metrics.constants';
import { Metrics } from './interfaces';

/**
 * @class MetricsService
 * @description Collects counters for the directory, mailbox and relay components
 * and exposes them as a single snapshot.
 */
@Injectable()
export class MetricsService {
  /** Timestamp when the service was initialized, used for uptime calculation */
  private readonly startTime: number = Date.now();

  private readonly counters = new Map<MetricPath, number>(
    Object.values(METRIC_PATHS).map((path): [MetricPath, number] => [path, 0]),
  );

  /** Number of successful deliveries folded into the running average */
  private deliveryCount = 0;
  /** Accumulator for the total time of all successful deliveries */
  private deliverySum = 0;

  /**
   * Retrieves the current state of all metrics.
   * @returns {Readonly<Metrics>} A fresh snapshot with dynamically calculated uptime.
   */
  getMetrics(): Readonly<Metrics> {
    const uptimeSeconds = Math.floor((Date.now() - this.startTime) / 1000);

    return {
      directory: {
        registrations_total: this.get(METRIC_PATHS.DIRECTORY_REGISTRATIONS_TOTAL),
        registrations_rejected: this.get(METRIC_PATHS.DIRECTORY_REGISTRATIONS_REJECTED),
        lookups_total: this.get(METRIC_PATHS.DIRECTORY_LOOKUPS_TOTAL),
        lookups_not_found: this.get(METRIC_PATHS.DIRECTORY_LOOKUPS_NOT_FOUND),
      },
      mailbox: {
        enqueued_total: this.get(METRIC_PATHS.MAILBOX_ENQUEUED_TOTAL),
        drains_total: this.get(METRIC_PATHS.MAILBOX_DRAINS_TOTAL),
        drained_total: this.get(METRIC_PATHS.MAILBOX_DRAINED_TOTAL),
      },
      relay: {
        sent_total: this.get(METRIC_PATHS.RELAY_SENT_TOTAL),
        succeeded_total: this.get(METRIC_PATHS.RELAY_SUCCEEDED_TOTAL),
        not_found_total: this.get(METRIC_PATHS.RELAY_NOT_FOUND_TOTAL),
        exhausted_total: this.get(METRIC_PATHS.RELAY_EXHAUSTED_TOTAL),
        cancelled_total: this.get(METRIC_PATHS.RELAY_CANCELLED_TOTAL),
        attempts_total: this.get(METRIC_PATHS.RELAY_ATTEMPTS_TOTAL),
        retries_total: this.get(METRIC_PATHS.RELAY_RETRIES_TOTAL),
        delivery_time_ms: this.deliveryCount === 0 ? 0 : Math.round(this.deliverySum / this.deliveryCount),
      },
      server: {
        uptime_seconds: uptimeSeconds,
      },
    };
  }

  /**
   * Current value of a single counter.
   */
  get(path: MetricPath): number {
    return this.counters.get(path) ?? 0;
  }

  /**
   * Increments a specific metric by the given value.
   * @param {MetricPath} path - The dot-separated path to the metric to increment.
   * @param {number} value - The value to increment by (default: 1).
   */
  increment(path: MetricPath, value: number = 1): void {
    this.counters.set(path, this.get(path) + value);
  }

  /**
   * Records how long a successful delivery took and updates the average.
   * @param {number} ms - Time from resolution to accepted delivery in milliseconds.
   */
  recordDeliveryTime(ms: number): void {
    this.deliveryCount++;
    this.deliverySum += ms;
  }
}
