import { Injectable } from '@nestjs/common';
import type { Clock } from '../domain/clock.port';

/**
 * Clock backed by the system time.
 */
@Injectable()
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}
