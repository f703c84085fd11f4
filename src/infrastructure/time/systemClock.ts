import type { ClockPort } from '@/ports/ClockPort';

/** Wall clock in epoch milliseconds. */
export const systemClock: ClockPort = {
  now: () => Date.now(),
};
