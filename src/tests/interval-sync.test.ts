import { afterEach, describe, expect, it, vi } from 'vitest';
import { createSessionStore, type SessionStore } from '../stores/session-store';
import { InspectorController } from '../services/sync/inspector-controller';
import { createSeries, seriesFromValues } from '../services/series/series';
import { MS_PER_DAY, MS_PER_MINUTE } from '../utils/time';
import type { DataItem } from '../types/session';
import type { Marking } from '../types/marking';
import { useSettingsStore } from '../stores/settings-store';
import { RecordingSurface } from './fakes/recording-surface';

const range = (n: number) => Array.from({ length: n }, (_, i) => i);

function setup(session: SessionStore = createSessionStore()) {
  const outlineSurface = new RecordingSurface();
  const detailSurface = new RecordingSurface();
  const controller = new InspectorController({ session, outlineSurface, detailSurface });
  return { session, outlineSurface, detailSurface, controller };
}

function add(session: SessionStore, values: number[], name: string): DataItem {
  const result = session.getState().addItem(seriesFromValues(values), name);
  if (!result.ok) throw new Error(result.message);
  return result.value;
}

function spanOf(surface: RecordingSurface, handle: string | undefined) {
  if (handle === undefined) throw new Error('no span');
  const span = surface.spans.get(handle);
  if (!span) throw new Error(`span ${handle} not rendered`);
  return span;
}

function onlyMarking(session: SessionStore, itemIndex = 0): Marking {
  const [marking] = session.getState().items[itemIndex].markings;
  if (!marking) throw new Error('no marking');
  return marking;
}

let active: InspectorController | null = null;

afterEach(() => {
  active?.dispose();
  active = null;
  useSettingsStore.setState({ onlyVisible: true });
});

describe('item added', () => {
  it('selects the first sixth of the first series', () => {
    const { session, outlineSurface, detailSurface, controller } = setup();
    active = controller;
    add(session, range(60).map((i) => i * 10), 'a');

    expect(controller.outline.getSelection()).toEqual([0, 10]);
    expect(outlineSurface.selection).toEqual([0, 10]);
    expect(controller.detail.currentInterval()).toEqual([0, 10]);
    expect(outlineSurface.xlim).toEqual([0, 59]);
    expect(outlineSurface.ylim).toEqual([0, 590]);

    const [detailLine] = detailSurface.lines.values();
    expect(detailLine.points.x).toEqual(range(11));
    expect(detailSurface.ylim).toEqual([-2, 102]);
  });

  it('keeps the selected interval when more items arrive', () => {
    const { session, detailSurface, controller } = setup();
    active = controller;
    add(session, range(60), 'a');
    add(session, range(100), 'b');

    expect(controller.detail.currentInterval()).toEqual([0, 10]);
    const lines = [...detailSurface.lines.values()];
    expect(lines).toHaveLength(2);
    expect(lines[1].points.x).toEqual(range(11));
  });

  it('attaches items that were loaded before the controller', () => {
    const session = createSessionStore();
    add(session, range(60), 'a');
    const { detailSurface, outlineSurface, controller } = setup(session);
    active = controller;
    expect(detailSurface.lines.size).toBe(1);
    expect(outlineSurface.lines.size).toBe(1);
    expect(controller.detail.currentInterval()).toEqual([0, 10]);
  });

  it('decimates only the outline', () => {
    const { session, outlineSurface, detailSurface, controller } = setup();
    active = controller;
    add(session, range(9000), 'big');
    const [outlineLine] = outlineSurface.lines.values();
    const [detailLine] = detailSurface.lines.values();
    expect(outlineLine.points.x).toHaveLength(2250);
    expect(detailLine.points.x).toHaveLength(1501);
  });
});

describe('interval selection', () => {
  it('ignores zero-width outline selections', () => {
    const { session, controller } = setup();
    active = controller;
    add(session, range(60), 'a');
    const listener = vi.fn();
    controller.outline.events.on('intervalSelected', listener);
    controller.outline.onSpanSelect(5, 5);
    expect(listener).not.toHaveBeenCalled();
    expect(controller.detail.currentInterval()).toEqual([0, 10]);
  });

  it('ignores zero-width detail selections', () => {
    const { session, controller } = setup();
    active = controller;
    add(session, range(60), 'a');
    session.getState().setActiveLabel('good');
    const listener = vi.fn();
    controller.detail.events.on('spanSelected', listener);
    controller.detail.onSpanSelect(5, 5);
    expect(listener).not.toHaveBeenCalled();
    expect(session.getState().items[0].markings).toEqual([]);
  });

  it('marks hidden items too when the only-visible setting is off', () => {
    const { session, controller } = setup();
    active = controller;
    add(session, range(60), 'a');
    const b = add(session, range(60), 'b');
    session.getState().setItemVisible(b, false);
    session.getState().setActiveLabel('good');

    controller.detail.onSpanSelect(2, 4);
    expect(session.getState().items.map((i) => i.markings.length)).toEqual([1, 0]);

    useSettingsStore.getState().setOnlyVisible(false);
    controller.detail.onSpanSelect(6, 8);
    expect(session.getState().items.map((i) => i.markings.length)).toEqual([2, 1]);
  });

  it('rescales y to visible items with a floored margin', () => {
    const { session, detailSurface, controller } = setup();
    active = controller;
    add(session, range(60).map((i) => i * 10), 'a');
    const loud = add(session, range(60).map(() => 1000), 'loud');

    controller.outline.selectInterval(0, 10);
    expect(detailSurface.ylim).toEqual([-20, 1020]);

    session.getState().setItemVisible(loud, false);
    controller.outline.selectInterval(0, 10);
    expect(detailSurface.ylim).toEqual([-2, 102]);
  });

  it('floors the y-span on constant data', () => {
    const { session, detailSurface, controller } = setup();
    active = controller;
    add(session, range(60).map(() => 5), 'flat');
    const ylim = detailSurface.ylim;
    expect(ylim?.[0]).toBeCloseTo(4.8);
    expect(ylim?.[1]).toBeCloseTo(5.2);
  });

  it('moves the interval by its own width', () => {
    const { session, controller } = setup();
    active = controller;
    add(session, range(60), 'a');
    controller.moveInterval('right');
    expect(controller.detail.currentInterval()).toEqual([10, 20]);
    controller.moveInterval('right');
    controller.moveInterval('left');
    expect(controller.detail.currentInterval()).toEqual([10, 20]);
  });

  it('maximizes to the visible extent, or all items when none is visible', () => {
    const { session, controller } = setup();
    active = controller;
    add(session, range(60), 'a');
    const b = add(session, range(100), 'b');

    controller.maximizeInterval();
    expect(controller.detail.currentInterval()).toEqual([0, 99]);

    session.getState().setItemVisible(b, false);
    controller.maximizeInterval();
    expect(controller.detail.currentInterval()).toEqual([0, 59]);

    session.getState().setItemsVisible(false);
    controller.maximizeInterval();
    expect(controller.detail.currentInterval()).toEqual([0, 99]);
  });

  it('projects time indices to days on the axis', () => {
    const { session, outlineSurface, controller } = setup();
    active = controller;
    const index = range(60).map((i) => MS_PER_DAY + i * MS_PER_MINUTE);
    session.getState().addItem(createSeries('time', index, range(60)), 'minutes');

    expect(controller.detail.currentInterval()).toEqual([MS_PER_DAY, MS_PER_DAY + 10 * MS_PER_MINUTE]);
    expect(outlineSurface.selection?.[0]).toBe(1);
    expect(outlineSurface.selection?.[1]).toBeCloseTo(1 + 10 / 1440, 12);
  });
});

describe('markings and spans', () => {
  it('turns a detail selection into markings drawn in both roles', () => {
    const { session, outlineSurface, detailSurface, controller } = setup();
    active = controller;
    add(session, range(60), 'a');
    session.getState().setActiveLabel('discard');

    controller.detail.onSpanSelect(2, 4);
    const marking = onlyMarking(session);
    expect(marking).toMatchObject({ start: 2, end: 4, label: 'discard' });

    for (const [surface, view] of [
      [detailSurface, controller.detail],
      [outlineSurface, controller.outline],
    ] as const) {
      expect(surface.spans.size).toBe(1);
      expect(spanOf(surface, view.spanFor(marking))).toMatchObject({ x0: 2, x1: 4, color: 'orange', visible: true });
    }
  });

  it('does not mark without an active label', () => {
    const { session, detailSurface, controller } = setup();
    active = controller;
    add(session, range(60), 'a');
    controller.detail.onSpanSelect(2, 4);
    expect(session.getState().items[0].markings).toEqual([]);
    expect(detailSurface.spans.size).toBe(0);
  });

  it('recolors spans when a marking is relabeled by a secondary click', () => {
    const { session, outlineSurface, detailSurface, controller } = setup();
    active = controller;
    const item = add(session, range(60), 'a');
    const marking = session.getState().addMarking(item, 2, 4, 'discard');
    session.getState().setActiveLabel('good');

    const handle = controller.detail.spanFor(marking);
    if (handle === undefined) throw new Error('no span');
    controller.detail.pickSpan(handle, { button: 'secondary' });

    expect(onlyMarking(session).label).toBe('good');
    expect(spanOf(detailSurface, handle).color).toBe('green');
    expect(spanOf(outlineSurface, controller.outline.spanFor(marking)).color).toBe('green');
  });

  it('removes spans from both roles on a shift click', () => {
    const { session, outlineSurface, detailSurface, controller } = setup();
    active = controller;
    const item = add(session, range(60), 'a');
    const marking = session.getState().addMarking(item, 2, 4, 'discard');

    const handle = controller.detail.spanFor(marking);
    if (handle === undefined) throw new Error('no span');
    controller.detail.pickSpan(handle, { button: 'primary', shiftKey: true });

    expect(session.getState().items[0].markings).toEqual([]);
    expect(detailSurface.spans.size).toBe(0);
    expect(outlineSurface.spans.size).toBe(0);
    expect(controller.detail.ownerOf(handle)).toBeUndefined();
  });

  it('leaves the marking alone on a plain click', () => {
    const { session, controller } = setup();
    active = controller;
    const item = add(session, range(60), 'a');
    const marking = session.getState().addMarking(item, 2, 4, 'discard');
    session.getState().setActiveLabel('good');
    const handle = controller.detail.spanFor(marking);
    if (handle === undefined) throw new Error('no span');
    controller.detail.pickSpan(handle, { button: 'primary' });
    expect(onlyMarking(session)).toEqual(marking);
  });

  it('hides spans with their item and ignores picks on hidden spans', () => {
    const { session, outlineSurface, detailSurface, controller } = setup();
    active = controller;
    const item = add(session, range(60), 'a');
    const marking = session.getState().addMarking(item, 2, 4, 'discard');
    session.getState().setItemVisible(item, false);

    const handle = controller.detail.spanFor(marking);
    expect(spanOf(detailSurface, handle).visible).toBe(false);
    expect(spanOf(outlineSurface, controller.outline.spanFor(marking)).visible).toBe(false);

    if (handle === undefined) throw new Error('no span');
    controller.detail.pickSpan(handle, { button: 'primary', shiftKey: true });
    expect(session.getState().items[0].markings).toHaveLength(1);

    session.getState().addMarking(item, 6, 8, 'zero');
    expect([...detailSurface.spans.values()].map((s) => s.visible)).toEqual([false, false]);
  });

  it('removes spans before the line when an item goes away', () => {
    const { session, outlineSurface, detailSurface, controller } = setup();
    active = controller;
    const a = add(session, range(60), 'a');
    const b = add(session, range(60), 'b');
    session.getState().addMarking(a, 2, 4, 'discard');
    const keep = session.getState().addMarking(b, 5, 6, 'zero');

    session.getState().removeItem(a);

    expect(detailSurface.lines.size).toBe(1);
    expect(outlineSurface.lines.size).toBe(1);
    expect(detailSurface.spans.size).toBe(1);
    expect(controller.detail.spanCount).toBe(1);
    expect(controller.outline.spansFor(a)).toEqual([]);
    expect(controller.detail.spanFor(keep)).toBeDefined();
  });

  it('deletes visible markings strictly inside the displayed interval', () => {
    const { session, detailSurface, controller } = setup();
    active = controller;
    const item = add(session, range(60), 'a');
    session.getState().addMarking(item, 2, 4, 'discard');
    session.getState().addMarking(item, 0, 5, 'discard');

    expect(controller.deleteVisibleMarkingsInDisplayedInterval()).toBe(1);
    expect(session.getState().items[0].markings.map((m) => [m.start, m.end])).toEqual([[0, 5]]);
    expect(detailSurface.spans.size).toBe(1);
  });
});

describe('rendering', () => {
  it('coalesces redraws across both surfaces', () => {
    vi.useFakeTimers();
    try {
      const { session, outlineSurface, detailSurface, controller } = setup();
      active = controller;
      add(session, range(60), 'a');
      add(session, range(60), 'b');
      expect(detailSurface.draws).toBe(0);
      vi.advanceTimersByTime(10);
      expect(detailSurface.draws).toBe(1);
      expect(outlineSurface.draws).toBe(1);
    } finally {
      vi.useRealTimers();
    }
  });

  it('toggles step style and vertex markers on current and later lines', () => {
    const { session, detailSurface, controller } = setup();
    active = controller;
    add(session, range(60), 'a');
    controller.toggleStepDrawStyle();
    controller.toggleVertexMarkers();
    add(session, range(60), 'b');
    expect([...detailSurface.lines.values()].map((l) => [l.drawStyle, l.vertexMarkers])).toEqual([
      ['steps', true],
      ['steps', true],
    ]);
    controller.toggleStepDrawStyle();
    expect([...detailSurface.lines.values()].map((l) => l.drawStyle)).toEqual(['default', 'default']);
  });

  it('stops following the session after dispose', () => {
    const { session, detailSurface, controller } = setup();
    controller.dispose();
    add(session, range(60), 'a');
    expect(detailSurface.lines.size).toBe(0);
  });
});
