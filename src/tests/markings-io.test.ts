import { afterEach, describe, expect, it } from 'vitest';
import { createSessionStore, type SessionStore } from '../stores/session-store';
import { seriesFromValues, createSeries } from '../services/series/series';
import { MemoryMarkingsTable, type MarkingsTable } from '../services/storage/markings-table';
import { registerPlugins } from '../services/plugins/registry';
import { PluginManager } from '../services/plugins/plugin-manager';
import { MARKINGS_IO, MarkingsIO, markingsIOPlugin, type MarkingsIOOptions } from '../services/plugins/markings-io';
import { useSettingsStore } from '../stores/settings-store';
import { DEFAULT_GAP_LIMIT } from '../constants/view-config';
import type { IndexRange, MarkingRecord, Metadata } from '../types/marking';
import type { DataItem } from '../types/session';

const range = (n: number) => Array.from({ length: n }, (_, i) => i);

function withMarkingsIO(session: SessionStore, options: MarkingsIOOptions) {
  const manager = new PluginManager(session, registerPlugins([markingsIOPlugin(options)]));
  manager.toggle(MARKINGS_IO);
  const plugin = manager.get(MARKINGS_IO);
  if (!(plugin instanceof MarkingsIO)) throw new Error('MarkingsIO not enabled');
  return { manager, plugin };
}

function add(session: SessionStore, metadata: Metadata, values: number[] = range(21)): DataItem {
  const result = session.getState().addItem(seriesFromValues(values), 'item', metadata);
  if (!result.ok) throw new Error(result.message);
  return result.value;
}

const bounds = (session: SessionStore) =>
  session.getState().items[0].markings.map((m) => [m.start, m.end, m.label]);

class FailingDeletesTable extends MemoryMarkingsTable {
  override async deleteMarkings(_metadata: Metadata, _ranges: IndexRange[]): Promise<number> {
    throw new Error('disk full');
  }
}

afterEach(() => {
  useSettingsStore.setState({ defaultGapLimit: DEFAULT_GAP_LIMIT });
});

describe('MarkingsIO', () => {
  it('saves markings and loads them into a fresh session', async () => {
    const table = new MemoryMarkingsTable();
    const first = createSessionStore();
    const { plugin } = withMarkingsIO(first, { table });
    const item = add(first, { site: 'north' });
    first.getState().addMarking(item, 6, 8, 'zero');
    first.getState().addMarking(item, 2, 4, 'good', 'checked');

    first.getState().saveSnapshot();
    await plugin.whenIdle();
    expect(await table.getMarkings({ site: 'north' })).toEqual<MarkingRecord[]>([
      { start: 2, end: 4, label: 'good', note: 'checked' },
      { start: 6, end: 8, label: 'zero', note: null },
    ]);

    const second = createSessionStore();
    const io = withMarkingsIO(second, { table });
    add(second, { site: 'north' });
    second.getState().loadMarkings();
    await io.plugin.whenIdle();
    expect(bounds(second)).toEqual([
      [2, 4, 'good'],
      [6, 8, 'zero'],
    ]);
  });

  it('loads only markings inside the item bounds', async () => {
    const table = new MemoryMarkingsTable();
    await table.upsertMarkings({ site: 'north' }, [
      { start: 2, end: 4, label: 'good', note: null },
      { start: 18, end: 25, label: 'good', note: null },
    ]);
    const session = createSessionStore();
    const { plugin } = withMarkingsIO(session, { table });
    add(session, { site: 'north' });
    session.getState().loadMarkings();
    await plugin.whenIdle();
    expect(bounds(session)).toEqual([[2, 4, 'good']]);
  });

  it('refuses a second load for the same metadata unless forced', async () => {
    const table = new MemoryMarkingsTable();
    await table.upsertMarkings({ site: 'north' }, [{ start: 2, end: 4, label: 'good', note: null }]);
    const session = createSessionStore();
    const { plugin } = withMarkingsIO(session, { table });
    add(session, { site: 'north' });

    session.getState().loadMarkings();
    session.getState().loadMarkings();
    await plugin.whenIdle();
    expect(bounds(session)).toHaveLength(1);

    session.getState().loadMarkings(true, true);
    await plugin.whenIdle();
    expect(bounds(session)).toHaveLength(2);
  });

  it('deletes removed markings and clears their tombstones', async () => {
    const table = new MemoryMarkingsTable();
    const session = createSessionStore();
    const { plugin } = withMarkingsIO(session, { table });
    const item = add(session, { site: 'north' });
    const marking = session.getState().addMarking(item, 2, 4, 'good');
    session.getState().saveSnapshot();
    session.getState().removeMarking(item, marking);
    session.getState().saveSnapshot();
    await plugin.whenIdle();

    expect(table.size).toBe(0);
    expect(session.getState().items[0].deletedMarkings).toEqual([]);
  });

  it('never deletes for totals', async () => {
    const table = new MemoryMarkingsTable();
    const session = createSessionStore();
    const { plugin } = withMarkingsIO(session, { table });
    const item = add(session, { site: 'north', is_total: true });
    const marking = session.getState().addMarking(item, 2, 4, 'good');
    session.getState().saveSnapshot();
    session.getState().removeMarking(item, marking);
    session.getState().saveSnapshot();
    await plugin.whenIdle();

    expect(await table.getMarkings({ site: 'north', is_total: true })).toHaveLength(1);
  });

  it('keeps tombstones when storage fails and keeps serving later requests', async () => {
    const table: MarkingsTable = new FailingDeletesTable();
    const session = createSessionStore();
    const { plugin } = withMarkingsIO(session, { table });
    const item = add(session, { site: 'north' });
    const marking = session.getState().addMarking(item, 2, 4, 'good');
    session.getState().removeMarking(item, marking);

    session.getState().saveSnapshot();
    await plugin.whenIdle();
    expect(session.getState().items[0].deletedMarkings).toEqual([marking]);

    session.getState().addMarking(item, 6, 8, 'zero');
    session.getState().saveSnapshot();
    await plugin.whenIdle();
    expect(await table.getMarkings({ site: 'north' })).toEqual([{ start: 6, end: 8, label: 'zero', note: null }]);
  });

  it('auto-marks gaps on visible items through its action', () => {
    const session = createSessionStore();
    const { manager } = withMarkingsIO(session, { table: new MemoryMarkingsTable(), gapLimit: '3' });
    const result = session.getState().addItem(
      createSeries('number', [0, 4, 8, 12, 16, 19], range(6)),
      'gappy',
      { site: 'north' }
    );
    expect(result.ok).toBe(true);

    expect(manager.runAction(MARKINGS_IO, 'Auto-mark gaps')).toBe(true);
    expect(bounds(session)).toEqual([
      [0, 4, 'discard'],
      [4, 8, 'discard'],
      [8, 12, 'discard'],
      [12, 16, 'discard'],
    ]);
  });

  it('still loads stored markings after auto-marking gaps', async () => {
    const table = new MemoryMarkingsTable();
    await table.upsertMarkings({ site: 'x' }, [{ start: 1, end: 2, label: 'good', note: null }]);
    const session = createSessionStore();
    const { plugin } = withMarkingsIO(session, { table });
    const result = session.getState().addItem(createSeries('number', [0, 2, 8], [1, 2, 3]), 'gappy', { site: 'x' });
    expect(result.ok).toBe(true);

    plugin.autoMarkGaps('3', 'discard');
    session.getState().loadMarkings();
    await plugin.whenIdle();

    expect(bounds(session)).toEqual([
      [2, 8, 'discard'],
      [1, 2, 'good'],
    ]);
  });

  it('takes the gap limit from settings when none is configured', () => {
    useSettingsStore.getState().setDefaultGapLimit('3');
    const session = createSessionStore();
    const { manager } = withMarkingsIO(session, { table: new MemoryMarkingsTable() });
    const result = session.getState().addItem(createSeries('number', [0, 2, 8, 9], range(4)), 'gappy', { site: 'x' });
    expect(result.ok).toBe(true);

    manager.runAction(MARKINGS_IO, 'Auto-mark gaps');

    expect(bounds(session)).toEqual([[2, 8, 'discard']]);
  });

  it('stops listening once disabled', async () => {
    const table = new MemoryMarkingsTable();
    const session = createSessionStore();
    const { manager, plugin } = withMarkingsIO(session, { table });
    const item = add(session, { site: 'north' });
    session.getState().addMarking(item, 2, 4, 'good');

    expect(manager.toggle(MARKINGS_IO)).toBe(false);
    expect(session.events.listenerCount('markingsSaved')).toBe(0);
    session.getState().saveSnapshot();
    await plugin.whenIdle();
    expect(table.size).toBe(0);
  });
});
