import type { MarkingRecord, Metadata } from '../../types/marking';
import type { Series } from '../../types/series';
import type { DataItem, SessionEventMap, SessionEventName, SessionResult, SnapshotEntry } from '../../types/session';
import type { Listener } from '../../utils/event-bus';

export interface PluginAction {
  name: string;
  run: () => void;
}

/** Session events a plugin listens to */
export type SlotBindings = { [K in SessionEventName]?: Listener<SessionEventMap[K]> };

/** Everything a plugin may do to the session */
export interface PluginHost {
  newData: (series: Series, name: string, metadata: Metadata) => SessionResult<DataItem>;
  newMarkings: (records: MarkingRecord[], metadata: Metadata) => SessionResult<number>;
  applyOnVisible: (callback: (series: Series, metadata: Metadata) => void) => void;
  /** Storage confirmed these deletes; the session can forget them */
  acknowledgeDeletes: (entries: SnapshotEntry[]) => void;
}

export interface InspectorPlugin {
  readonly name: string;
  readonly actions?: readonly PluginAction[];
  readonly slotBindings: SlotBindings;
  destroy(): void;
}

export interface PluginFactory {
  readonly name: string;
  create(host: PluginHost): InspectorPlugin;
}
