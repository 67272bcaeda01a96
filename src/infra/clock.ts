import type { IClock } from '../types/interfaces.js';

export class SystemClock implements IClock {
  now(): Date {
    return new Date();
  }
}

export const systemClock = new SystemClock();
