/** Millisecond wall clock; injected so scans and expiry are reproducible */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
