/** Returns the current time in epoch milliseconds. */
export type Clock = () => number;

/** Injection token for the clock the token codec and resolver read. */
export const CLOCK = Symbol('CLOCK');

export const systemClock: Clock = () => Date.now();
