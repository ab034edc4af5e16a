import { DETAIL_SELECTION_COLOR } from '../../constants/theme';
import type { ViewConfig } from '../../constants/view-config';
import type { SessionStore } from '../../stores/session-store';
import type { Marking } from '../../types/marking';
import type { DataItem } from '../../types/session';
import type { DrawStyle, PlotSurface, SpanHandle } from '../../types/surface';
import { createEventBus, type EventBus } from '../../utils/event-bus';
import { sliceByIndex, valueRange } from '../series/series';
import { SpanView } from './span-view';

/** Modifier state of a pointer event on a span */
export interface PickGesture {
  button: 'primary' | 'secondary' | 'middle';
  shiftKey?: boolean;
  ctrlKey?: boolean;
}

export interface DetailEventMap {
  /** Domain bounds of a drag selection in the detail view */
  spanSelected: { start: number; end: number };
  spanPicked: { item: DataItem; marking: Marking; gesture: PickGesture };
}

/** Full-resolution view of the selected interval; new markings are drawn here */
export class DetailView extends SpanView {
  readonly events: EventBus<DetailEventMap> = createEventBus<DetailEventMap>();
  private drawStyle: DrawStyle = 'default';
  private vertexMarkers = false;

  constructor(surface: PlotSurface, session: SessionStore, config: ViewConfig) {
    super('detail', surface, session, config, DETAIL_SELECTION_COLOR);
  }

  addItem(item: DataItem): void {
    let start: number;
    let end: number;
    const current = this.xlim;
    if (this.itemLines.size === 0 || current === null) {
      const { index } = item.series;
      start = index[0];
      end = index[this.preshownEndPosition(index.length)];
    } else {
      [start, end] = current;
    }

    const points = sliceByIndex(item.series, start, end);
    const line = this.surface.addLine(this.toAxisPoints(points), this.lineStyle(item));
    this.registerLine(item, line);
    if (this.drawStyle !== 'default') this.surface.setLineDrawStyle(line, this.drawStyle);
    if (this.vertexMarkers) this.surface.setLineVertexMarkers(line, true);

    this.displayInterval(start, end);
  }

  /** Show [x0, x1] (domain units) for every item and rescale y to the visible data */
  displayInterval(x0: number, x1: number): void {
    this.logger.debug(`Displaying interval [${x0}, ${x1}] (${this.role})`);
    let y: [number, number] | null = null;
    for (const item of this.renderedItems()) {
      const line = this.itemLines.get(item.id);
      if (line === undefined) continue;
      const points = sliceByIndex(item.series, x0, x1);
      this.surface.setLineData(line, this.toAxisPoints(points));
      if (!item.visible) continue;
      const range = valueRange(points.y);
      if (range === null) continue;
      y = y === null ? range : [Math.min(y[0], range[0]), Math.max(y[1], range[1])];
    }

    this.setXLim(x0, x1);
    const [ymin, ymax] = y ?? [0, 0];
    const yspan = Math.max(Math.abs(ymax - ymin), this.config.minimumYRange);
    const margin = yspan * this.config.yMarginFraction;
    this.setYLim(ymin - margin, ymax + margin);
    this.redraw();
  }

  /** Displayed interval in domain units */
  currentInterval(): [number, number] | null {
    return this.getXLim();
  }

  onSpanSelect(x0: number, x1: number): void {
    if (x0 === x1) return;
    this.events.emit('spanSelected', { start: this.fromAxis(x0), end: this.fromAxis(x1) });
  }

  /** Pointer hit on a rendered span; hidden spans cannot be picked */
  pickSpan(span: SpanHandle, gesture: PickGesture): void {
    if (!this.surface.isSpanVisible(span)) return;
    const owner = this.spanOwners.get(span);
    if (!owner) {
      this.logger.error('item for span unexpectedly not found');
      return;
    }
    const item = this.session.getState().getItem(owner.itemId);
    const marking = item?.markings.find((m) => m.id === owner.markingId);
    if (!item || !marking) {
      this.logger.error(`marking ${owner.markingId} for span unexpectedly not found`);
      return;
    }
    this.events.emit('spanPicked', { item, marking, gesture });
  }

  override addMarkingSpan(item: DataItem, marking: Marking): void {
    this.logger.info(`Item: ${item.name} Marking: ${JSON.stringify(marking)}`);
    super.addMarkingSpan(item, marking);
  }

  toggleStepDrawStyle(): void {
    this.drawStyle = this.drawStyle === 'steps' ? 'default' : 'steps';
    for (const line of this.itemLines.values()) this.surface.setLineDrawStyle(line, this.drawStyle);
    this.redraw();
  }

  toggleVertexMarkers(): void {
    this.vertexMarkers = !this.vertexMarkers;
    for (const line of this.itemLines.values()) this.surface.setLineVertexMarkers(line, this.vertexMarkers);
    this.redraw();
  }

  getDrawStyle(): DrawStyle {
    return this.drawStyle;
  }

  hasVertexMarkers(): boolean {
    return this.vertexMarkers;
  }
}
