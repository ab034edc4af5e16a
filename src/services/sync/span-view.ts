import { COLORS, DATA_ALPHA, LINEWIDTH, SPAN_ALPHA, UNKNOWN_LABEL_COLOR } from '../../constants/theme';
import { LABEL_COLOR_MAP } from '../../constants/labels';
import type { ViewConfig } from '../../constants/view-config';
import type { SessionStore } from '../../stores/session-store';
import type { Marking } from '../../types/marking';
import type { SeriesPoints } from '../../types/series';
import type { DataItem, ItemRef } from '../../types/session';
import type { LineHandle, LineStyle, PlotSurface, SpanHandle, SpanStyle } from '../../types/surface';
import type { Unsubscribe } from '../../utils/event-bus';
import { createLogger, type Logger } from '../../utils/logger';
import { projectionFor, type AxisProjection } from './projection';

export type ViewRole = 'outline' | 'detail';

export interface SpanOwner {
  itemId: string;
  markingId: string;
}

/**
 * Shared bookkeeping for the outline and detail roles: one line per item and
 * one span per marking, with lookups in every direction.
 */
export abstract class SpanView {
  protected readonly logger: Logger = createLogger('span');
  protected readonly itemLines = new Map<string, LineHandle>();
  protected readonly markingSpans = new Map<string, SpanHandle>();
  protected readonly spanOwners = new Map<SpanHandle, SpanOwner>();
  protected readonly itemSpans = new Map<string, SpanHandle[]>();
  /** Current x-limits in domain units */
  protected xlim: [number, number] | null = null;
  protected readonly selectionStyle: SpanStyle;
  private readonly redrawListeners = new Set<() => void>();

  constructor(
    readonly role: ViewRole,
    protected readonly surface: PlotSurface,
    protected readonly session: SessionStore,
    protected readonly config: ViewConfig,
    selectionColor: string
  ) {
    this.selectionStyle = { color: selectionColor, alpha: SPAN_ALPHA };
  }

  abstract addItem(item: DataItem): void;

  /** Drag selection in axis coordinates */
  abstract onSpanSelect(x0: number, x1: number): void;

  get projection(): AxisProjection {
    return projectionFor(this.session.getState().indexKind);
  }

  toAxis(value: number): number {
    return this.projection.toAxis(value);
  }

  fromAxis(coordinate: number): number {
    return this.projection.fromAxis(coordinate);
  }

  onRedrawRequest(listener: () => void): Unsubscribe {
    this.redrawListeners.add(listener);
    return () => {
      this.redrawListeners.delete(listener);
    };
  }

  protected redraw(): void {
    this.logger.debug(`Requesting redraw (${this.role})`);
    for (const listener of this.redrawListeners) listener();
  }

  hasItem(item: ItemRef): boolean {
    return this.itemLines.has(item.id);
  }

  lineFor(item: ItemRef): LineHandle | undefined {
    return this.itemLines.get(item.id);
  }

  spanFor(marking: Pick<Marking, 'id'>): SpanHandle | undefined {
    return this.markingSpans.get(marking.id);
  }

  spansFor(item: ItemRef): readonly SpanHandle[] {
    return this.itemSpans.get(item.id) ?? [];
  }

  ownerOf(span: SpanHandle): SpanOwner | undefined {
    return this.spanOwners.get(span);
  }

  get spanCount(): number {
    return this.markingSpans.size;
  }

  getXLim(): [number, number] | null {
    return this.xlim;
  }

  setXLim(x0: number, x1: number): void {
    this.logger.debug(`Setting xlim (${this.role})`);
    this.xlim = [x0, x1];
    this.surface.setXLim(this.toAxis(x0), this.toAxis(x1));
  }

  setYLim(y0: number, y1: number): void {
    this.logger.debug(`Setting ylim (${this.role})`);
    this.surface.setYLim(y0, y1);
  }

  protected toAxisPoints(points: SeriesPoints): SeriesPoints {
    const { toAxis } = this.projection;
    return { x: points.x.map(toAxis), y: points.y };
  }

  protected lineStyle(item: DataItem): LineStyle {
    return {
      label: item.name,
      color: COLORS[Math.min(item.colorSlot, COLORS.length - 1)],
      alpha: DATA_ALPHA,
      width: LINEWIDTH,
    };
  }

  protected registerLine(item: DataItem, line: LineHandle): void {
    this.itemLines.set(item.id, line);
    this.itemSpans.set(item.id, []);
    if (!item.visible) this.surface.setLineVisible(line, false);
  }

  /** Line and spans follow the item's visible flag */
  setItemVisible(item: DataItem): void {
    const line = this.itemLines.get(item.id);
    if (line === undefined || this.surface.isLineVisible(line) === item.visible) return;
    this.surface.setLineVisible(line, item.visible);
    for (const span of this.spansFor(item)) {
      this.surface.setSpanVisible(span, item.visible);
    }
    this.redraw();
  }

  /** Spans go before the line so nothing is left attached to a removed line */
  removeItem(item: ItemRef): void {
    const line = this.itemLines.get(item.id);
    if (line === undefined) {
      this.logger.debug(`No line for item ${item.id} (${this.role})`);
      return;
    }
    for (const span of this.spansFor(item)) {
      const owner = this.spanOwners.get(span);
      if (owner) this.markingSpans.delete(owner.markingId);
      this.spanOwners.delete(span);
      this.surface.removeSpan(span);
    }
    this.itemSpans.delete(item.id);
    this.itemLines.delete(item.id);
    this.surface.removeLine(line);
    this.redraw();
  }

  addMarkingSpan(item: DataItem, marking: Marking): void {
    const line = this.itemLines.get(item.id);
    if (line === undefined) {
      this.logger.error(`Cannot add span, item "${item.name}" has no line (${this.role})`);
      return;
    }
    this.logger.debug(`Creating span (${this.role})`);
    const span = this.surface.addSpan(this.toAxis(marking.start), this.toAxis(marking.end), {
      color: LABEL_COLOR_MAP[marking.label] ?? UNKNOWN_LABEL_COLOR,
      alpha: SPAN_ALPHA,
    });
    this.surface.setSpanVisible(span, this.surface.isLineVisible(line));
    this.markingSpans.set(marking.id, span);
    this.spanOwners.set(span, { itemId: item.id, markingId: marking.id });
    this.itemSpans.set(item.id, [...this.spansFor(item), span]);
    this.redraw();
  }

  updateSpanColor(marking: Marking): void {
    const span = this.markingSpans.get(marking.id);
    if (span === undefined) return;
    this.surface.setSpanColor(span, LABEL_COLOR_MAP[marking.label] ?? UNKNOWN_LABEL_COLOR);
    this.redraw();
  }

  removeMarkingSpan(item: ItemRef, marking: Pick<Marking, 'id'>): void {
    const span = this.markingSpans.get(marking.id);
    if (span === undefined) return;
    this.markingSpans.delete(marking.id);
    this.spanOwners.delete(span);
    this.itemSpans.set(
      item.id,
      this.spansFor(item).filter((s) => s !== span)
    );
    this.surface.removeSpan(span);
    this.redraw();
  }

  /** Items of the session that have a line in this role, in session order */
  protected renderedItems(): DataItem[] {
    return this.session.getState().items.filter((i) => this.itemLines.has(i.id));
  }

  /** Position of the last point shown when the first series is loaded */
  protected preshownEndPosition(length: number): number {
    if (length < 2) return 0;
    const points = Math.min(this.config.maxPreshownPoints, Math.floor(length / this.config.fractionPreshown));
    return Math.min(length - 1, Math.max(1, points));
  }
}
