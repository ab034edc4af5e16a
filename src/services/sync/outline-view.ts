import { OUTLINE_SELECTION_COLOR } from '../../constants/theme';
import type { ViewConfig } from '../../constants/view-config';
import type { SessionStore } from '../../stores/session-store';
import type { DataItem, ItemRef } from '../../types/session';
import type { PlotSurface } from '../../types/surface';
import { createEventBus, type EventBus } from '../../utils/event-bus';
import { formatInterval } from '../../utils/time';
import { decimate } from '../analysis/decimate';
import { valueRange } from '../series/series';
import { SpanView } from './span-view';

export interface OutlineEventMap {
  /** Domain bounds of the interval chosen in the overview */
  intervalSelected: { start: number; end: number };
}

/** Overview of every item, decimated, with the current interval highlighted */
export class OutlineView extends SpanView {
  readonly events: EventBus<OutlineEventMap> = createEventBus<OutlineEventMap>();
  private currentSelection: [number, number] | null = null;

  constructor(surface: PlotSurface, session: SessionStore, config: ViewConfig) {
    super('outline', surface, session, config, OUTLINE_SELECTION_COLOR);
  }

  addItem(item: DataItem): void {
    const points = decimate(item.series, {
      threshold: this.config.resampleThreshold,
      target: this.config.resampledPoints,
    });
    this.logger.debug(`Resampled outline view from ${item.series.index.length} to ${points.x.length}`);

    const isFirst = this.itemLines.size === 0;
    const line = this.surface.addLine(this.toAxisPoints(points), this.lineStyle(item));
    this.registerLine(item, line);

    if (isFirst) {
      const { index } = item.series;
      const endPosition = this.preshownEndPosition(index.length);
      this.onSpanSelect(this.toAxis(index[0]), this.toAxis(index[endPosition]));
    }
    this.setAxesLimitsFromData();
    this.redraw();
  }

  override removeItem(item: ItemRef): void {
    super.removeItem(item);
    this.setAxesLimitsFromData();
  }

  /** Items the extent rules apply to: the visible ones, or all when none is visible */
  private extentItems(): DataItem[] {
    const items = this.renderedItems();
    const visible = items.filter((i) => i.visible);
    return visible.length > 0 ? visible : items;
  }

  dataLimits(): { x: [number, number]; y: [number, number] | null } | null {
    const items = this.extentItems();
    if (items.length === 0) return null;
    const xmin = Math.min(...items.map((i) => i.series.index[0]));
    const xmax = Math.max(...items.map((i) => i.series.index[i.series.index.length - 1]));
    let y: [number, number] | null = null;
    for (const item of items) {
      const range = valueRange(item.series.values);
      if (range === null) continue;
      y = y === null ? range : [Math.min(y[0], range[0]), Math.max(y[1], range[1])];
    }
    return { x: [xmin, xmax], y };
  }

  setAxesLimitsFromData(): void {
    const limits = this.dataLimits();
    if (limits === null) return;
    this.setXLim(limits.x[0], limits.x[1]);
    if (limits.y !== null) this.setYLim(limits.y[0], limits.y[1]);
  }

  /** Current interval in domain units */
  getSelection(): [number, number] | null {
    return this.currentSelection;
  }

  displayMaximalInterval(): void {
    const limits = this.dataLimits();
    const [x0, x1] = limits === null ? [0, 1] : limits.x;
    this.onSpanSelect(this.toAxis(x0), this.toAxis(x1));
  }

  onSpanSelect(x0: number, x1: number): void {
    if (x0 === x1) return;
    this.surface.setSelection([x0, x1], this.selectionStyle);

    const start = this.fromAxis(x0);
    const end = this.fromAxis(x1);
    this.currentSelection = [start, end];
    this.logger.info(`Viewing ${formatInterval(start, end, this.session.getState().indexKind)}`);
    this.events.emit('intervalSelected', { start, end });
  }

  /** Select an interval given in domain units */
  selectInterval(start: number, end: number): void {
    this.onSpanSelect(this.toAxis(start), this.toAxis(end));
  }
}
