import { isLabel } from '../../constants/labels';
import type { MarkingRecord } from '../../types/marking';
import type { Series } from '../../types/series';
import { createLogger } from '../../utils/logger';
import { parseDuration } from '../../utils/time';

const logger = createLogger('plugins');

/**
 * Threshold in index units. Time series take a duration ("20s", "5min", ...),
 * number series a plain delta.
 */
export function gapThreshold(series: Series, gapLimit: string | number): number {
  if (series.kind === 'time') return parseDuration(gapLimit);
  return typeof gapLimit === 'number' ? gapLimit : Number(gapLimit);
}

/**
 * One record per consecutive index pair further apart than `gapLimit`.
 * Returns null for an unknown label or an unparseable limit.
 */
export function detectGaps(series: Series, gapLimit: string | number, label: string): MarkingRecord[] | null {
  if (!isLabel(label)) {
    logger.error(`Bad label ${label}`);
    return null;
  }
  const threshold = gapThreshold(series, gapLimit);
  if (Number.isNaN(threshold)) {
    logger.error(`Bad gap limit ${String(gapLimit)}`);
    return null;
  }

  const records: MarkingRecord[] = [];
  for (let i = 1; i < series.index.length; i++) {
    const start = series.index[i - 1];
    const end = series.index[i];
    if (end - start > threshold) {
      records.push({ start, end, label, note: null });
    }
  }
  return records;
}
