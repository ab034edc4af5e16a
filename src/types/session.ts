import type { Label } from '../constants/labels';
import type { Marking, Metadata } from './marking';
import type { IndexKind, Series } from './series';

export interface DataItem {
  id: string;
  name: string;
  series: Series;
  metadata: Metadata;
  visible: boolean;
  /** Palette slot used for default coloring */
  colorSlot: number;
  markings: Marking[];
  /** Removed markings kept until storage acknowledges the delete */
  deletedMarkings: Marking[];
}

export type ItemRef = Pick<DataItem, 'id'>;
export type MarkingRef = Pick<Marking, 'id'>;

export type ValidationReason =
  | 'NotASeries'
  | 'EmptySeries'
  | 'IndexKindMismatch'
  | 'UnknownLabel'
  | 'NoActiveLabel'
  | 'MissingMetadata';

export type SessionResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: ValidationReason; message: string };

export interface SnapshotEntry {
  itemId: string;
  metadata: Metadata;
  markings: Marking[];
}

export interface SessionSnapshot {
  changed: SnapshotEntry[];
  deleted: SnapshotEntry[];
}

export interface SessionEventMap {
  itemAdded: { item: DataItem };
  itemRemoved: { item: DataItem };
  itemVisibilityChanged: { item: DataItem };
  markingAdded: { item: DataItem; marking: Marking };
  markingRemoved: { item: DataItem; marking: Marking };
  markingLabelUpdated: { item: DataItem; marking: Marking };
  intervalTagged: { metadata: Metadata; start: number; end: number; tag: string };
  markingsSaved: SessionSnapshot;
  loadMarkingsRequested: { metadata: Metadata; start: number; end: number; force: boolean };
}

export type SessionEventName = keyof SessionEventMap;

export interface SessionData {
  items: DataItem[];
  activeLabel: Label | null;
  /** Locked by the first item ever added */
  indexKind: IndexKind | null;
  totalItemsEverAdded: number;
}
