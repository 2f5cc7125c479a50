import { Injectable } from '@nestjs/common';

export const CLOCK = Symbol('CLOCK');

/**
 * Source of transaction timestamps, in whole Unix seconds.
 */
export interface Clock {
  now(): number;
}

@Injectable()
export class SystemClock implements Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}
