import { resolveViewConfig, type ViewConfig } from '../../constants/view-config';
import type { SessionStore } from '../../stores/session-store';
import { useSettingsStore } from '../../stores/settings-store';
import type { Marking } from '../../types/marking';
import type { DataItem } from '../../types/session';
import type { PlotSurface } from '../../types/surface';
import type { Unsubscribe } from '../../utils/event-bus';
import { createLogger } from '../../utils/logger';
import { formatInterval } from '../../utils/time';
import { DetailView, type PickGesture } from './detail-view';
import { OutlineView } from './outline-view';
import { RedrawScheduler } from './redraw-scheduler';

const logger = createLogger('span');

export type MoveDirection = 'left' | 'right';

export interface InspectorControllerOptions {
  session: SessionStore;
  outlineSurface: PlotSurface;
  detailSurface: PlotSurface;
  config?: Partial<ViewConfig>;
  /** Whether new markings go only to visible items; follows the settings store when omitted */
  onlyVisible?: boolean;
}

/**
 * Keeps the outline and detail roles in step with the session: item and
 * marking events fan out to both roles (detail first), outline selections
 * drive the detail interval, and detail selections create markings.
 */
export class InspectorController {
  readonly session: SessionStore;
  readonly outline: OutlineView;
  readonly detail: DetailView;
  readonly config: ViewConfig;
  private readonly onlyVisibleOverride: boolean | undefined;
  private readonly scheduler: RedrawScheduler;
  private readonly surfaces: PlotSurface[];
  private subscriptions: Unsubscribe[] = [];

  constructor({ session, outlineSurface, detailSurface, config, onlyVisible }: InspectorControllerOptions) {
    this.session = session;
    this.config = resolveViewConfig(config);
    this.onlyVisibleOverride = onlyVisible;
    this.detail = new DetailView(detailSurface, session, this.config);
    this.outline = new OutlineView(outlineSurface, session, this.config);
    this.surfaces = [...new Set([outlineSurface, detailSurface])];
    this.scheduler = new RedrawScheduler(() => this.drawNow(), this.config.redrawDelayMs);

    const views = [this.detail, this.outline];
    const { events } = session;
    this.subscriptions = [
      events.on('itemAdded', ({ item }) => this.attachItem(item)),
      events.on('itemRemoved', ({ item }) => {
        for (const view of views) view.removeItem(item);
      }),
      events.on('itemVisibilityChanged', ({ item }) => {
        for (const view of views) view.setItemVisible(item);
      }),
      events.on('markingAdded', ({ item, marking }) => {
        for (const view of views) view.addMarkingSpan(item, marking);
      }),
      events.on('markingRemoved', ({ item, marking }) => {
        for (const view of views) view.removeMarkingSpan(item, marking);
      }),
      events.on('markingLabelUpdated', ({ marking }) => {
        for (const view of views) view.updateSpanColor(marking);
      }),
      this.outline.events.on('intervalSelected', ({ start, end }) => this.detail.displayInterval(start, end)),
      this.detail.events.on('spanSelected', ({ start, end }) => {
        session.getState().newMarkingAtSelection(start, end, this.onlyVisible());
      }),
      this.detail.events.on('spanPicked', ({ item, marking, gesture }) => this.markingPicked(item, marking, gesture)),
      ...views.map((view) => view.onRedrawRequest(() => this.requestRedraw())),
    ];

    // items loaded before the controller existed
    for (const item of session.getState().items) this.attachItem(item);
  }

  onlyVisible(): boolean {
    return this.onlyVisibleOverride ?? useSettingsStore.getState().onlyVisible;
  }

  private attachItem(item: DataItem): void {
    for (const view of [this.detail, this.outline]) {
      view.addItem(item);
      for (const marking of item.markings) view.addMarkingSpan(item, marking);
    }
  }

  requestRedraw(): void {
    this.scheduler.request();
  }

  /** Draw immediately if a redraw is pending */
  flushRedraw(): void {
    this.scheduler.flush();
  }

  private drawNow(): void {
    for (const surface of this.surfaces) surface.draw();
  }

  /** Shift the displayed interval by its own width */
  moveInterval(direction: MoveDirection): void {
    const current = this.detail.currentInterval();
    if (current === null) return;
    const [x0, x1] = current;
    const width = x1 - x0;
    if (direction === 'left') {
      this.outline.selectInterval(x0 - width, x0);
    } else {
      this.outline.selectInterval(x1, x1 + width);
    }
  }

  maximizeInterval(): void {
    this.outline.displayMaximalInterval();
  }

  deleteVisibleMarkingsInDisplayedInterval(): number {
    const current = this.detail.currentInterval();
    if (current === null) return 0;
    const removed = this.session.getState().deleteMarkingsInRange(current[0], current[1], true);
    this.requestRedraw();
    return removed;
  }

  toggleStepDrawStyle(): void {
    this.detail.toggleStepDrawStyle();
  }

  toggleVertexMarkers(): void {
    this.detail.toggleVertexMarkers();
  }

  markingPicked(item: DataItem, marking: Marking, gesture: PickGesture): void {
    const state = this.session.getState();
    let action: string;
    let label = `'${marking.label}'`;
    if (gesture.button === 'secondary') {
      const result = state.relabelMarking(marking);
      if (!result.ok) return;
      action = 'Changing';
      label = `'${marking.label}' -> '${result.value.label}'`;
    } else if (gesture.shiftKey) {
      state.removeMarking(item, marking);
      return;
    } else if (gesture.ctrlKey) {
      logger.warn('Editing the note of a marking is not supported');
      return;
    } else {
      action = 'Clicked';
    }
    logger.info(
      `${action} '${item.name}' ${formatInterval(marking.start, marking.end, state.indexKind)} ${label}  | note: ${marking.note ?? 'None'}`
    );
  }

  /** Detach from the session and drop any pending redraw */
  dispose(): void {
    for (const unsubscribe of this.subscriptions) unsubscribe();
    this.subscriptions = [];
    this.outline.events.clear();
    this.detail.events.clear();
    this.scheduler.cancel();
  }
}
