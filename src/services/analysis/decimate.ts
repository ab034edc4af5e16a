import type { Series, SeriesPoints } from '../../types/series';
import { MS_PER_DAY, MS_PER_SECOND } from '../../utils/time';

export interface DecimationOptions {
  /** Series with at least this many points are reduced */
  threshold: number;
  /** Approximate number of points after reduction */
  target: number;
}

/**
 * Bucket width in ms for a time series: millisecond bins when the average
 * spacing is at most 0.1 s, whole seconds otherwise, never less than one unit.
 */
export function bucketPeriodMs(series: Series, target: number): number {
  const n = series.index.length;
  const spanSeconds = (series.index[n - 1] - series.index[0]) / MS_PER_SECOND;
  const periodSeconds = spanSeconds / target;
  if (spanSeconds / n <= 0.1) {
    return Math.max(Math.floor(periodSeconds * MS_PER_SECOND), 1);
  }
  return Math.floor(Math.max(periodSeconds, 1)) * MS_PER_SECOND;
}

/**
 * Mean of each bucket, labeled by the bucket start. Buckets are aligned to
 * midnight (UTC) of the first timestamp; a bucket without values yields NaN
 * so the rendered line shows the hole.
 */
export function bucketMean(series: Series, periodMs: number): SeriesPoints {
  const origin = Math.floor(series.index[0] / MS_PER_DAY) * MS_PER_DAY;
  const firstBucket = Math.floor((series.index[0] - origin) / periodMs);
  const lastBucket = Math.floor((series.index[series.index.length - 1] - origin) / periodMs);
  const count = lastBucket - firstBucket + 1;
  const sums = new Array<number>(count).fill(0);
  const counts = new Array<number>(count).fill(0);

  series.index.forEach((t, i) => {
    const value = series.values[i];
    if (Number.isNaN(value)) return;
    const bucket = Math.floor((t - origin) / periodMs) - firstBucket;
    sums[bucket] += value;
    counts[bucket] += 1;
  });

  const x: number[] = [];
  const y: number[] = [];
  for (let b = 0; b < count; b++) {
    x.push(origin + (firstBucket + b) * periodMs);
    y.push(counts[b] > 0 ? sums[b] / counts[b] : NaN);
  }
  return { x, y };
}

export function stride(series: Series, step: number): SeriesPoints {
  const x: number[] = [];
  const y: number[] = [];
  for (let i = 0; i < series.index.length; i += step) {
    x.push(series.index[i]);
    y.push(series.values[i]);
  }
  return { x, y };
}

/** Points to render in the overview; the series itself is never changed */
export function decimate(series: Series, { threshold, target }: DecimationOptions): SeriesPoints {
  const n = series.index.length;
  if (n < threshold || n < 2) {
    return { x: series.index, y: series.values };
  }
  if (series.kind === 'time') {
    return bucketMean(series, bucketPeriodMs(series, target));
  }
  return stride(series, Math.max(1, Math.floor(n / target)));
}
