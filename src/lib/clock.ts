/** Single source of "now" for expiry and lockout arithmetic. */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
