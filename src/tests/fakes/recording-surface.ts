import type { SeriesPoints } from '../../types/series';
import type {
  DrawStyle,
  LineHandle,
  LineStyle,
  PlotSurface,
  SpanHandle,
  SpanStyle,
} from '../../types/surface';

export interface RecordedLine {
  points: SeriesPoints;
  style: LineStyle;
  visible: boolean;
  drawStyle: DrawStyle;
  vertexMarkers: boolean;
}

export interface RecordedSpan {
  x0: number;
  x1: number;
  color: string;
  alpha: number;
  visible: boolean;
}

/** PlotSurface that keeps everything it is told in plain maps */
export class RecordingSurface implements PlotSurface {
  readonly lines = new Map<LineHandle, RecordedLine>();
  readonly spans = new Map<SpanHandle, RecordedSpan>();
  selection: [number, number] | null = null;
  xlim: [number, number] | null = null;
  ylim: [number, number] | null = null;
  draws = 0;
  private nextId = 0;

  private line(handle: LineHandle): RecordedLine {
    const line = this.lines.get(handle);
    if (!line) throw new Error(`unknown line ${handle}`);
    return line;
  }

  private span(handle: SpanHandle): RecordedSpan {
    const span = this.spans.get(handle);
    if (!span) throw new Error(`unknown span ${handle}`);
    return span;
  }

  addLine(points: SeriesPoints, style: LineStyle): LineHandle {
    const handle = `line-${this.nextId++}`;
    this.lines.set(handle, { points, style, visible: true, drawStyle: 'default', vertexMarkers: false });
    return handle;
  }

  setLineData(line: LineHandle, points: SeriesPoints): void {
    this.line(line).points = points;
  }

  setLineVisible(line: LineHandle, visible: boolean): void {
    this.line(line).visible = visible;
  }

  isLineVisible(line: LineHandle): boolean {
    return this.line(line).visible;
  }

  setLineDrawStyle(line: LineHandle, style: DrawStyle): void {
    this.line(line).drawStyle = style;
  }

  setLineVertexMarkers(line: LineHandle, enabled: boolean): void {
    this.line(line).vertexMarkers = enabled;
  }

  removeLine(line: LineHandle): void {
    this.line(line);
    this.lines.delete(line);
  }

  addSpan(x0: number, x1: number, style: SpanStyle): SpanHandle {
    const handle = `span-${this.nextId++}`;
    this.spans.set(handle, { x0, x1, color: style.color, alpha: style.alpha, visible: true });
    return handle;
  }

  setSpanColor(span: SpanHandle, color: string): void {
    this.span(span).color = color;
  }

  setSpanVisible(span: SpanHandle, visible: boolean): void {
    this.span(span).visible = visible;
  }

  isSpanVisible(span: SpanHandle): boolean {
    return this.span(span).visible;
  }

  removeSpan(span: SpanHandle): void {
    this.span(span);
    this.spans.delete(span);
  }

  setSelection(range: [number, number] | null): void {
    this.selection = range;
  }

  setXLim(x0: number, x1: number): void {
    this.xlim = [x0, x1];
  }

  setYLim(y0: number, y1: number): void {
    this.ylim = [y0, y1];
  }

  draw(): void {
    this.draws += 1;
  }
}
