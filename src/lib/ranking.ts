export interface PickOptions<T> {
  metric: (item: T) => number;
  prefer: 'max' | 'min';
  /** Chronological key; on an equal metric the earlier week wins. */
  week?: (item: T) => number;
}

/**
 * Single pass "first to achieve" scan. A later item replaces the current best
 * only when its metric is strictly better, or equal and from an earlier week.
 * Anything else that ties keeps the item seen first.
 */
export function pickFirstBest<T>(items: Iterable<T>, opts: PickOptions<T>): T | undefined {
  let best: T | undefined;
  let bestMetric = 0;
  for (const item of items) {
    const m = opts.metric(item);
    if (best === undefined) {
      best = item;
      bestMetric = m;
      continue;
    }
    const better = opts.prefer === 'max' ? m > bestMetric : m < bestMetric;
    const earlier = m === bestMetric && opts.week !== undefined && opts.week(item) < opts.week(best);
    if (better || earlier) {
      best = item;
      bestMetric = m;
    }
  }
  return best;
}
