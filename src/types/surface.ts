import type { SeriesPoints } from './series';

export type LineHandle = string;
export type SpanHandle = string;

export type DrawStyle = 'default' | 'steps';

export interface LineStyle {
  label: string;
  color: string;
  alpha: number;
  width: number;
}

export interface SpanStyle {
  color: string;
  alpha: number;
}

/**
 * Rendering target for one view role. All x coordinates are in axis units
 * (see AxisProjection); the surface never sees domain values.
 */
export interface PlotSurface {
  addLine(points: SeriesPoints, style: LineStyle): LineHandle;
  setLineData(line: LineHandle, points: SeriesPoints): void;
  setLineVisible(line: LineHandle, visible: boolean): void;
  isLineVisible(line: LineHandle): boolean;
  setLineDrawStyle(line: LineHandle, style: DrawStyle): void;
  setLineVertexMarkers(line: LineHandle, enabled: boolean): void;
  removeLine(line: LineHandle): void;

  addSpan(x0: number, x1: number, style: SpanStyle): SpanHandle;
  setSpanColor(span: SpanHandle, color: string): void;
  setSpanVisible(span: SpanHandle, visible: boolean): void;
  isSpanVisible(span: SpanHandle): boolean;
  removeSpan(span: SpanHandle): void;

  /** Current drag-selection rectangle, or null to clear it */
  setSelection(range: [number, number] | null, style: SpanStyle): void;
  setXLim(x0: number, x1: number): void;
  setYLim(y0: number, y1: number): void;

  draw(): void;
}
