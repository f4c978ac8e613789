export function toIsoDateUTC(d: Date): string {
  return `${d.getUTCFullYear()}-${String(d.getUTCMonth() + 1).padStart(2, "0")}-${String(d.getUTCDate()).padStart(2, "0")}`;
}

export type Clock = () => Date;

/**
 * Wraps a time source so consecutive readings never go backwards,
 * even if the wall clock is adjusted between inserts.
 */
export function createMonotonicClock(source: Clock = () => new Date()): Clock {
  let last = 0;
  return () => {
    const now = source().getTime();
    last = Math.max(last, now);
    return new Date(last);
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
