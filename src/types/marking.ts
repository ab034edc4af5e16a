import type { Label } from '../constants/labels';

export type MetadataValue = string | number | boolean | null;

/** Opaque key/value mapping correlating an item with external storage */
export type Metadata = Record<string, MetadataValue>;

/** A labeled half-open interval [start, end) on an item's index */
export interface Marking {
  id: string;
  start: number;
  end: number;
  label: Label;
  note: string | null;
}

/** Marking as exchanged with storage and analysis helpers (no identity) */
export interface MarkingRecord {
  start: number;
  end: number;
  label: Label;
  note: string | null;
}

export interface IndexRange {
  start: number;
  end: number;
}
