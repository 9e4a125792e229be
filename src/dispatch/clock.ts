/**
 * Time source used to stamp requests.
 *
 * @module dispatch/clock
 */

export interface Clock {
  now(): Promise<Date>;
}

/**
 * Reads the system clock.
 */
export const systemClock: Clock = {
  now: async () => new Date(),
};

/**
 * Always reports the same instant. Useful for replaying a signature.
 */
export function fixedClock(date: Date): Clock {
  const time = date.getTime();
  return {
    now: async () => new Date(time),
  };
}
