/** Whether a series is indexed by epoch-millisecond timestamps or by plain numbers */
export type IndexKind = 'time' | 'number';

export interface Series {
  kind: IndexKind;
  /** Strictly increasing; epoch milliseconds when kind is 'time' */
  index: number[];
  values: number[];
  name?: string;
}

/** Several series sharing one index, one per column */
export interface SeriesTable {
  kind: IndexKind;
  index: number[];
  columns: Record<string, number[]>;
}

export interface SeriesPoints {
  x: number[];
  y: number[];
}
