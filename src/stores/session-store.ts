import { createStore, type StoreApi } from 'zustand/vanilla';
import { useStore } from 'zustand';
import { COLORS } from '../constants/theme';
import { isLabel, type Label } from '../constants/labels';
import type { Marking, MarkingRecord, Metadata } from '../types/marking';
import type { Series } from '../types/series';
import type {
  DataItem,
  ItemRef,
  MarkingRef,
  SessionData,
  SessionEventMap,
  SessionEventName,
  SessionResult,
  SessionSnapshot,
  SnapshotEntry,
  ValidationReason,
} from '../types/session';
import {
  SeriesSchema,
  firstIndex,
  firstValidIndex,
  lastIndex,
  lastValidIndex,
  seriesLength,
} from '../services/series/series';
import { createEventBus, type EventBus } from '../utils/event-bus';
import { SessionInvariantError } from '../utils/errors';
import { generateId } from '../utils/ids';
import { createLogger } from '../utils/logger';
import { matchesMetadata } from '../utils/metadata';
import { formatInterval } from '../utils/time';

const logger = createLogger('model');

export const SESSION_EVENT_NAMES = [
  'itemAdded',
  'itemRemoved',
  'itemVisibilityChanged',
  'markingAdded',
  'markingRemoved',
  'markingLabelUpdated',
  'intervalTagged',
  'markingsSaved',
  'loadMarkingsRequested',
] as const satisfies readonly SessionEventName[];

export interface SessionState extends SessionData {
  addItem: (series: unknown, name?: string | null, metadata?: Metadata | null) => SessionResult<DataItem>;
  removeItem: (item: ItemRef) => void;
  /** Remove several items; nothing is removed if any of them is missing */
  removeItems: (items: ItemRef[]) => void;
  setActiveLabel: (label: string) => SessionResult<Label>;
  setItemVisible: (item: ItemRef, visible: boolean) => void;
  setItemsVisible: (how?: 'invert' | boolean) => void;

  addMarking: (item: ItemRef, start: number, end: number, label: Label, note?: string | null) => Marking;
  /** Mark [start, end] with the active label on every targeted item */
  newMarkingAtSelection: (start: number, end: number, onlyVisible?: boolean) => Marking[];
  removeMarking: (item: ItemRef, marking: MarkingRef) => void;
  relabelMarking: (marking: MarkingRef) => SessionResult<Marking>;
  deleteMarkingsInRange: (x0: number, x1: number, onlyVisible?: boolean) => number;
  deleteAllMarkingsForVisible: () => number;
  newMarkingsFromDescription: (records: MarkingRecord[], metadata: Metadata) => SessionResult<number>;

  tagFullExtent: (item: ItemRef, tag: string) => void;
  tagItems: (tag: string, onlyVisible?: boolean) => void;
  tagBetweenOuterMarkings: (item: ItemRef, tag: string) => void;
  tagItemsBetweenOuterMarkings: (tag: string, onlyVisible?: boolean) => void;

  saveSnapshot: (onlyVisible?: boolean) => SessionSnapshot;
  /** Drop tombstones once storage has acknowledged their deletion */
  clearDeletedMarkings: (entries: SnapshotEntry[]) => void;
  loadMarkings: (onlyVisible?: boolean, force?: boolean) => void;
  applyOnVisible: (callback: (series: Series, metadata: Metadata) => void) => void;

  matchItemsByMetadata: (partial: Metadata) => DataItem[];
  getItems: (onlyVisible?: boolean) => DataItem[];
  getItem: (id: string) => DataItem | undefined;
}

export interface SessionStore extends StoreApi<SessionState> {
  events: EventBus<SessionEventMap>;
}

function describe(value: unknown): string {
  let text: string;
  try {
    text = JSON.stringify(value) ?? String(value);
  } catch {
    text = String(value);
  }
  return text.slice(0, 100);
}

/** Lowest palette slot not held by a loaded item; the last slot is shared once all are taken */
function lowestFreeSlot(items: DataItem[]): number {
  const taken = new Set(items.map((i) => i.colorSlot));
  for (let slot = 0; slot < COLORS.length; slot++) {
    if (!taken.has(slot)) return slot;
  }
  return COLORS.length - 1;
}

function uniqueName(base: string, items: DataItem[]): string {
  const taken = new Set(items.map((i) => i.name));
  if (!taken.has(base)) return base;
  let n = 2;
  while (taken.has(`${base} (${n})`)) n++;
  return `${base} (${n})`;
}

export function createSessionStore(): SessionStore {
  const events = createEventBus<SessionEventMap>();

  const store = createStore<SessionState>()((set, get) => {
    function reject<T>(reason: ValidationReason, message: string, level: 'warn' | 'error'): SessionResult<T> {
      logger[level](message);
      return { ok: false, reason, message };
    }

    function requireItem(ref: ItemRef): DataItem {
      const item = get().items.find((i) => i.id === ref.id);
      if (!item) throw new SessionInvariantError(`item ${ref.id} is not part of the session`);
      return item;
    }

    function replaceItem(next: DataItem): void {
      set((s) => ({ items: s.items.map((i) => (i.id === next.id ? next : i)) }));
    }

    function targets(onlyVisible: boolean): DataItem[] {
      const { items } = get();
      return onlyVisible ? items.filter((i) => i.visible) : items;
    }

    function emitTag(item: DataItem, start: number, end: number, tag: string): void {
      events.emit('intervalTagged', { metadata: item.metadata, start, end, tag });
    }

    return {
      items: [],
      activeLabel: null,
      indexKind: null,
      totalItemsEverAdded: 0,

      addItem: (series, name, metadata) => {
        const parsed = SeriesSchema.safeParse(series);
        if (!parsed.success) {
          return reject('NotASeries', `Cannot add item that is not a series: ${describe(series)}`, 'error');
        }
        const data: Series = parsed.data;
        const { items, indexKind } = get();
        const slot = lowestFreeSlot(items);
        const length = seriesLength(data);

        let itemName: string;
        if (name !== undefined && name !== null) {
          itemName = String(name);
        } else if (data.name !== undefined) {
          itemName = data.name;
        } else {
          itemName = uniqueName(`${COLORS[slot]} - ${length}`, items);
          logger.warn(`Found no name for series, using color and number of values: "${itemName}"`);
        }

        if (length === 0) {
          return reject('EmptySeries', `series ${itemName} is empty, cannot add to view`, 'error');
        }

        const kind = indexKind ?? data.kind;
        if (data.kind !== kind) {
          const message =
            kind === 'time'
              ? `Cannot add "${itemName}": series without a time index when the x-axis is time`
              : `Cannot add "${itemName}": series with a time index when the x-axis is numeric`;
          return reject('IndexKindMismatch', message, 'warn');
        }

        const item: DataItem = {
          id: generateId('item'),
          name: itemName,
          series: data,
          metadata: { ...(metadata ?? {}) },
          visible: true,
          colorSlot: slot,
          markings: [],
          deletedMarkings: [],
        };
        set((s) => ({
          items: [...s.items, item],
          indexKind: kind,
          totalItemsEverAdded: s.totalItemsEverAdded + 1,
        }));
        logger.debug(`Added "${itemName}" (${length} values, slot ${slot})`);
        events.emit('itemAdded', { item });
        return { ok: true, value: item };
      },

      removeItem: (ref) => {
        const item = requireItem(ref);
        set((s) => ({ items: s.items.filter((i) => i.id !== item.id) }));
        events.emit('itemRemoved', { item });
      },

      removeItems: (refs) => {
        const order = new Map(get().items.map((item, idx) => [item.id, idx]));
        const resolved = refs.map(requireItem);
        const unique = [...new Map(resolved.map((i) => [i.id, i])).values()];
        unique.sort((a, b) => (order.get(b.id) ?? 0) - (order.get(a.id) ?? 0));
        for (const item of unique) {
          get().removeItem(item);
        }
      },

      setActiveLabel: (label) => {
        if (!isLabel(label)) {
          return reject('UnknownLabel', `unknown label ${label}`, 'error');
        }
        set({ activeLabel: label });
        return { ok: true, value: label };
      },

      setItemVisible: (ref, visible) => {
        const item = requireItem(ref);
        if (item.visible === visible) return;
        const next: DataItem = { ...item, visible };
        replaceItem(next);
        events.emit('itemVisibilityChanged', { item: next });
      },

      setItemsVisible: (how = 'invert') => {
        for (const item of get().items) {
          get().setItemVisible(item, how === 'invert' ? !item.visible : how);
        }
      },

      addMarking: (ref, start, end, label, note = null) => {
        const item = requireItem(ref);
        const marking: Marking = { id: generateId('mk'), start, end, label, note };
        const next: DataItem = { ...item, markings: [...item.markings, marking] };
        replaceItem(next);
        logger.info(`Marked ${formatInterval(start, end, get().indexKind)}`);
        events.emit('markingAdded', { item: next, marking });
        return marking;
      },

      newMarkingAtSelection: (start, end, onlyVisible = true) => {
        const { activeLabel } = get();
        if (!activeLabel) {
          logger.info('No label mode selected. Select one and try again');
          return [];
        }
        return targets(onlyVisible).map((item) => get().addMarking(item, start, end, activeLabel));
      },

      removeMarking: (ref, markingRef) => {
        const item = requireItem(ref);
        const marking = item.markings.find((m) => m.id === markingRef.id);
        if (!marking) {
          throw new SessionInvariantError(`marking ${markingRef.id} is not on item "${item.name}"`);
        }
        const next: DataItem = {
          ...item,
          markings: item.markings.filter((m) => m.id !== marking.id),
          deletedMarkings: [...item.deletedMarkings, marking],
        };
        replaceItem(next);
        events.emit('markingRemoved', { item: next, marking });
        logger.info(
          `Removed '${item.name}' ${formatInterval(marking.start, marking.end, get().indexKind)} ` +
            `${marking.label}  | note: ${marking.note ?? 'None'}`
        );
      },

      relabelMarking: (markingRef) => {
        const { activeLabel, items } = get();
        if (!activeLabel) {
          return reject('NoActiveLabel', 'Current label not set', 'error');
        }
        const item = items.find((i) => i.markings.some((m) => m.id === markingRef.id));
        if (!item) {
          throw new SessionInvariantError(`marking ${markingRef.id} does not belong to any item`);
        }
        let updated: Marking | undefined;
        const markings = item.markings.map((m) => {
          if (m.id !== markingRef.id) return m;
          updated = { ...m, label: activeLabel };
          return updated;
        });
        if (!updated) {
          throw new SessionInvariantError(`marking ${markingRef.id} vanished while relabeling`);
        }
        const next: DataItem = { ...item, markings };
        replaceItem(next);
        events.emit('markingLabelUpdated', { item: next, marking: updated });
        return { ok: true, value: updated };
      },

      deleteMarkingsInRange: (x0, x1, onlyVisible = true) => {
        let removed = 0;
        for (const item of targets(onlyVisible)) {
          for (const mark of item.markings) {
            const inside = x0 < mark.start && mark.start < x1 && x0 < mark.end && mark.end < x1;
            if (inside) {
              get().removeMarking(item, mark);
              removed++;
            }
          }
        }
        return removed;
      },

      deleteAllMarkingsForVisible: () => {
        let removed = 0;
        for (const item of targets(true)) {
          for (const mark of item.markings) {
            get().removeMarking(item, mark);
            removed++;
          }
        }
        return removed;
      },

      newMarkingsFromDescription: (records, metadata) => {
        if (Object.keys(metadata).length === 0) {
          return reject(
            'MissingMetadata',
            `Won't add markings unless item metadata is given and matches a loaded item (${describe(records.slice(0, 1))})`,
            'error'
          );
        }
        const matching = get().matchItemsByMetadata(metadata);
        let added = 0;
        for (const item of matching) {
          for (const record of records) {
            get().addMarking(item, record.start, record.end, record.label, record.note);
            added++;
          }
        }
        return { ok: true, value: added };
      },

      tagFullExtent: (ref, tag) => {
        const item = requireItem(ref);
        const start = firstValidIndex(item.series);
        const end = lastValidIndex(item.series);
        if (start === null || end === null) {
          logger.warn(`"${item.name}" has no valid values, nothing to tag`);
          return;
        }
        emitTag(item, start, end, tag);
      },

      tagItems: (tag, onlyVisible = true) => {
        for (const item of targets(onlyVisible)) get().tagFullExtent(item, tag);
      },

      tagBetweenOuterMarkings: (ref, tag) => {
        const item = requireItem(ref);
        if (item.markings.length === 0) return;
        const start = Math.min(...item.markings.map((m) => m.start));
        const end = Math.max(...item.markings.map((m) => m.end));
        emitTag(item, start, end, tag);
      },

      tagItemsBetweenOuterMarkings: (tag, onlyVisible = true) => {
        for (const item of targets(onlyVisible)) get().tagBetweenOuterMarkings(item, tag);
      },

      saveSnapshot: (onlyVisible = true) => {
        const snapshot: SessionSnapshot = { changed: [], deleted: [] };
        for (const item of targets(onlyVisible)) {
          snapshot.changed.push({ itemId: item.id, metadata: item.metadata, markings: [...item.markings] });
          snapshot.deleted.push({ itemId: item.id, metadata: item.metadata, markings: [...item.deletedMarkings] });
        }
        events.emit('markingsSaved', snapshot);
        return snapshot;
      },

      clearDeletedMarkings: (entries) => {
        for (const entry of entries) {
          const item = get().items.find((i) => i.id === entry.itemId);
          if (!item) {
            logger.debug(`item ${entry.itemId} was removed before its deletes were acknowledged`);
            continue;
          }
          const acknowledged = new Set(entry.markings.map((m) => m.id));
          if (!item.deletedMarkings.some((m) => acknowledged.has(m.id))) continue;
          replaceItem({ ...item, deletedMarkings: item.deletedMarkings.filter((m) => !acknowledged.has(m.id)) });
        }
      },

      loadMarkings: (onlyVisible = true, force = false) => {
        for (const item of targets(onlyVisible)) {
          events.emit('loadMarkingsRequested', {
            metadata: item.metadata,
            start: firstIndex(item.series),
            end: lastIndex(item.series),
            force,
          });
        }
      },

      applyOnVisible: (callback) => {
        for (const item of targets(true)) callback(item.series, item.metadata);
      },

      matchItemsByMetadata: (partial) => get().items.filter((i) => matchesMetadata(i.metadata, partial)),
      getItems: (onlyVisible = false) => targets(onlyVisible),
      getItem: (id) => get().items.find((i) => i.id === id),
    };
  });

  return Object.assign(store, { events });
}

export function useSessionStore<T>(session: SessionStore, selector: (state: SessionState) => T): T {
  return useStore(session, selector);
}
