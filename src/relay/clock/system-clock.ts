import { Injectable } from '@nestjs/common';
import { setTimeout as delay } from 'timers/promises';
import type { Clock } from './clock.interface';

@Injectable()
export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    await delay(ms, undefined, { signal });
  }
}
