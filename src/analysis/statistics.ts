export type NonEmptyArray<T> = readonly [T, ...T[]];

export function isNonEmpty<T>(values: readonly T[]): values is NonEmptyArray<T> {
  return values.length > 0;
}

export function pluck<T>(values: NonEmptyArray<T>, select: (value: T) => number): NonEmptyArray<number> {
  const [first, ...rest] = values;
  return [select(first), ...rest.map(select)];
}

export function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

export function mean(values: NonEmptyArray<number>): number {
  return sum(values) / values.length;
}

/**
 * Mean over the values that are present; `null` when there are none.
 */
export function meanOfDefined(values: ReadonlyArray<number | undefined>): number | null {
  const defined = values.filter((value): value is number => value !== undefined);
  return isNonEmpty(defined) ? mean(defined) : null;
}

export function min(values: NonEmptyArray<number>): number {
  return values.reduce((lowest, value) => (value < lowest ? value : lowest), values[0]);
}

export function max(values: NonEmptyArray<number>): number {
  return values.reduce((highest, value) => (value > highest ? value : highest), values[0]);
}

/**
 * Quantile with linear interpolation between the closest order statistics
 * (position `(n - 1) * q` in the sorted values).
 */
export function quantile(values: NonEmptyArray<number>, q: number): number {
  if (q < 0 || q > 1) {
    throw new RangeError(`Quantile must be within [0, 1], received ${q}`);
  }

  const sorted = [...values].sort((a, b) => a - b);
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const fraction = position - lower;

  return sorted[lower] + (sorted[upper] - sorted[lower]) * fraction;
}

export function median(values: NonEmptyArray<number>): number {
  return quantile(values, 0.5);
}

export function percentage(part: number, whole: number): number {
  return (part / whole) * 100;
}

export function groupBy<T, K>(values: readonly T[], keyOf: (value: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const value of values) {
    const key = keyOf(value);
    const group = groups.get(key);
    if (group) {
      group.push(value);
    } else {
      groups.set(key, [value]);
    }
  }
  return groups;
}

export interface ValueCount<K> {
  value: K;
  count: number;
}

/**
 * Occurrence counts, most frequent first. Equal counts keep the order in
 * which their values were first seen.
 */
export function valueCounts<K>(values: readonly K[]): ValueCount<K>[] {
  const counts = new Map<K, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  return Array.from(counts, ([value, count]) => ({ value, count })).sort(
    (a, b) => b.count - a.count,
  );
}
