/**
 * Clock port for time-dependent operations.
 * Lets tests pin "now" without touching Date.
 */
export interface Clock {
  now(): Date;
}

export const CLOCK = Symbol('CLOCK');
