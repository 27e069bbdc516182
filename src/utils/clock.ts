/**
 * Source of the current time for expiration and TTL checks
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date()
};
