/** Source of "now". Services read it at every comparison so tests can pin or move time. */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/** Clock frozen at `at` until `set` moves it. */
export function fixedClock(at: Date | string | number): Clock & { set(next: Date | string | number): void } {
  let current = new Date(at);
  return {
    now: () => new Date(current.getTime()),
    set(next) {
      current = new Date(next);
    },
  };
}
