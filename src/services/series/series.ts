import { z } from 'zod';
import type { IndexKind, Series, SeriesPoints, SeriesTable } from '../../types/series';

const finiteOrNaN = z.number().or(z.nan());

function strictlyIncreasing(index: number[]): boolean {
  for (let i = 1; i < index.length; i++) {
    if (!(index[i] > index[i - 1])) return false;
  }
  return true;
}

export const IndexKindSchema = z.enum(['time', 'number']);

export const SeriesSchema = z
  .object({
    kind: IndexKindSchema,
    index: z.array(z.number().finite()),
    values: z.array(finiteOrNaN),
    name: z.string().optional(),
  })
  .refine((s) => s.index.length === s.values.length, {
    message: 'index and values must have the same length',
  })
  .refine((s) => strictlyIncreasing(s.index), { message: 'index must be strictly increasing' });

export const SeriesTableSchema = z
  .object({
    kind: IndexKindSchema,
    index: z.array(z.number().finite()),
    columns: z.record(z.array(finiteOrNaN)),
  })
  .refine((t) => Object.values(t.columns).every((c) => c.length === t.index.length), {
    message: 'every column must match the index length',
  })
  .refine((t) => strictlyIncreasing(t.index), { message: 'index must be strictly increasing' });

export function isSeries(value: unknown): value is Series {
  return SeriesSchema.safeParse(value).success;
}

export function isSeriesTable(value: unknown): value is SeriesTable {
  return SeriesTableSchema.safeParse(value).success;
}

/** Series over positions 0..n-1 */
export function seriesFromValues(values: number[], name?: string): Series {
  return {
    kind: 'number',
    index: values.map((_, i) => i),
    values: [...values],
    ...(name !== undefined ? { name } : {}),
  };
}

export function seriesFromTable(table: SeriesTable): Array<[string, Series]> {
  return Object.entries(table.columns).map(([name, values]) => [
    name,
    { kind: table.kind, index: [...table.index], values: [...values], name },
  ]);
}

export function createSeries(kind: IndexKind, index: number[], values: number[], name?: string): Series {
  return { kind, index, values, ...(name !== undefined ? { name } : {}) };
}

export function seriesLength(series: Series): number {
  return series.index.length;
}

export function firstIndex(series: Series): number {
  return series.index[0];
}

export function lastIndex(series: Series): number {
  return series.index[series.index.length - 1];
}

/** First index whose value is not NaN, or null when every value is NaN */
export function firstValidIndex(series: Series): number | null {
  const i = series.values.findIndex((v) => !Number.isNaN(v));
  return i === -1 ? null : series.index[i];
}

export function lastValidIndex(series: Series): number | null {
  for (let i = series.values.length - 1; i >= 0; i--) {
    if (!Number.isNaN(series.values[i])) return series.index[i];
  }
  return null;
}

/** Position of the first index value >= x */
function lowerBound(index: number[], x: number): number {
  let lo = 0;
  let hi = index.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (index[mid] < x) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** Position of the first index value > x */
function upperBound(index: number[], x: number): number {
  let lo = 0;
  let hi = index.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (index[mid] <= x) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** Points whose index lies in [x0, x1], both ends inclusive */
export function sliceByIndex(series: Series, x0: number, x1: number): SeriesPoints {
  const from = lowerBound(series.index, x0);
  const to = upperBound(series.index, x1);
  return {
    x: series.index.slice(from, to),
    y: series.values.slice(from, to),
  };
}

export function valueRange(values: number[]): [number, number] | null {
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (Number.isNaN(v)) continue;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return min === Infinity ? null : [min, max];
}
