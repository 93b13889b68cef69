export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

// Globals are read per call so test fake timers take effect.
export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) =>
    ms <= 0 ? Promise.resolve() : new Promise((resolve) => setTimeout(resolve, ms)),
};
