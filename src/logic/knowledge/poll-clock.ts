import { Injectable } from '@nestjs/common';
import { setTimeout as delay } from 'node:timers/promises';

/** Waits between readiness polls. Swapped for an immediate clock in tests. */
@Injectable()
export class PollClock {
  async sleep(ms: number): Promise<void> {
    await delay(ms);
  }
}
