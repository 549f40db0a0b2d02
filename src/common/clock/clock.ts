import { Injectable } from '@nestjs/common';

export const CLOCK = Symbol('CLOCK');

// Source of "now" for trade validation and window anchoring.
export interface Clock {
  now(): Date;
}

@Injectable()
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}
