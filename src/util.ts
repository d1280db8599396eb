export function groupBy<T>(
  data: Iterable<T>,
  keyFn: (item: T) => string,
): Record<string, T[]> {
  const result: Record<string, T[]> = {};

  for (const item of data) {
    const key = keyFn(item);
    const group = result[key];
    if (group) {
      group.push(item);
    } else {
      result[key] = [item];
    }
  }

  return result;
}

const ZONE_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i;
const DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;

/**
 * Parse a provider timestamp into epoch milliseconds. Timestamps without a
 * zone designator are read as UTC. Returns null when the value is not a
 * date-time.
 */
export function parseInstant(value: string | null | undefined): number | null {
  const text = value?.trim().replace(" ", "T");
  if (!text || !DATE_PREFIX.test(text)) return null;

  const dateOnly = text.length === 10;
  const ms = Date.parse(dateOnly || ZONE_SUFFIX.test(text) ? text : `${text}Z`);
  return Number.isFinite(ms) ? ms : null;
}

/**
 * Format epoch milliseconds as `YYYY-MM-DDTHH:mm:ssZ`.
 */
export function formatInstant(ms: number): string {
  return new Date(ms).toISOString().replace(".000Z", "Z");
}

/**
 * The UTC calendar day (`YYYY-MM-DD`) of a timestamp.
 */
export function utcDate(timestamp: string): string | null {
  const ms = parseInstant(timestamp);
  return ms === null ? null : formatInstant(ms).slice(0, 10);
}

export function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Create a limiter that runs at most `concurrency` tasks at once. A
 * concurrency of 0 or Infinity runs every task immediately.
 */
export function createLimiter(concurrency: number): Limiter {
  if (!Number.isFinite(concurrency) || concurrency <= 0) {
    return (task) => task();
  }

  let active = 0;
  const queue: (() => void)[] = [];

  const next = () => {
    active--;
    queue.shift()?.();
  };

  return <T>(task: () => Promise<T>) =>
    new Promise<T>((resolve, reject) => {
      const start = () => {
        active++;
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(next);
      };

      if (active < concurrency) start();
      else queue.push(start);
    });
}
