/**
 * Time source injected into services so that deadlines and schedules
 * can be computed against a fixed instant in tests.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export function fixedClock(instant: Date): Clock & { set(next: Date): void } {
  let current = new Date(instant.getTime());
  return {
    now: () => new Date(current.getTime()),
    set(next: Date) {
      current = new Date(next.getTime());
    },
  };
}
