const DAY_MS = 86_400_000;

/** UTC calendar day of an epoch-millisecond timestamp, as YYYY-MM-DD. */
export const tradingDayOf = (timestamp: number): string =>
  new Date(Math.floor(timestamp / DAY_MS) * DAY_MS).toISOString().slice(0, 10);

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
