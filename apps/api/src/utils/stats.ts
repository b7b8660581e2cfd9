export const average = (values: number[]): number | null => {
  if (!values.length) {
    return null;
  }

  const sum = values.reduce((total, current) => total + current, 0);
  return sum / values.length;
};

export const median = (values: number[]): number | null => {
  if (!values.length) {
    return null;
  }

  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);

  if (sorted.length % 2 === 0) {
    return (sorted[middle - 1] + sorted[middle]) / 2;
  }

  return sorted[middle];
};

/**
 * Most frequent non-null value. Ties go to the value that appears first in `values`.
 */
export const mode = <T>(values: readonly (T | null)[]): T | null => {
  const counts = new Map<T, number>();
  let best: T | null = null;
  let bestCount = 0;

  values.forEach((value) => {
    if (value === null) {
      return;
    }

    counts.set(value, (counts.get(value) ?? 0) + 1);
  });

  // Map iteration follows insertion order, so the first-seen value wins a tie.
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }

  return best;
};

export const countDistinct = <T>(values: Iterable<T | null>): number => {
  const seen = new Set<T>();
  for (const value of values) {
    if (value !== null) {
      seen.add(value);
    }
  }
  return seen.size;
};
