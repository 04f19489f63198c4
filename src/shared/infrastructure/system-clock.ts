import { Injectable } from '@nestjs/common';
import type { Clock } from '../domain/clock.port';

/**
 * Wall-clock time for production wiring.
 */
@Injectable()
export class SystemClock implements Clock {
  now(): Date {
    return new Date(Date.now());
  }
}
