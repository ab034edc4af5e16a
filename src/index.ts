export * from './constants/labels';
export * from './constants/theme';
export * from './constants/view-config';
export { DEFAULT_SHORTCUTS } from './constants/default-shortcuts';

export type * from './types/series';
export type * from './types/marking';
export type * from './types/session';
export type * from './types/surface';
export type * from './types/shortcuts';

export { createSessionStore, useSessionStore, SESSION_EVENT_NAMES } from './stores/session-store';
export type { SessionState, SessionStore } from './stores/session-store';
export { useSettingsStore } from './stores/settings-store';

export * from './services/series/series';
export { loadSeries, loadJson } from './services/series/series-loader';
export { decimate, bucketMean, bucketPeriodMs, stride } from './services/analysis/decimate';
export type { DecimationOptions } from './services/analysis/decimate';
export { detectGaps, gapThreshold } from './services/analysis/gap-detection';

export { projectionFor, timeProjection, identityProjection } from './services/sync/projection';
export type { AxisProjection } from './services/sync/projection';
export { SpanView } from './services/sync/span-view';
export type { SpanOwner, ViewRole } from './services/sync/span-view';
export { OutlineView } from './services/sync/outline-view';
export type { OutlineEventMap } from './services/sync/outline-view';
export { DetailView } from './services/sync/detail-view';
export type { DetailEventMap, PickGesture } from './services/sync/detail-view';
export { RedrawScheduler } from './services/sync/redraw-scheduler';
export { InspectorController } from './services/sync/inspector-controller';
export type { InspectorControllerOptions, MoveDirection } from './services/sync/inspector-controller';

export {
  MarkingRecordSchema,
  MemoryMarkingsTable,
  mergeRecords,
  removeRanges,
  toRecord,
} from './services/storage/markings-table';
export type { MarkingsTable } from './services/storage/markings-table';
export { IdbMarkingsTable } from './services/storage/idb-markings-table';

export type * from './services/plugins/types';
export { registerPlugins } from './services/plugins/registry';
export { PluginManager, createPluginHost, bindSlots } from './services/plugins/plugin-manager';
export { MarkingsIO, markingsIOPlugin, MARKINGS_IO } from './services/plugins/markings-io';
export type { MarkingsIOOptions } from './services/plugins/markings-io';
export { RandomGenerator, randomGeneratorPlugin, RANDOM_GENERATOR } from './services/plugins/random-generator';
export type { RandomGeneratorOptions } from './services/plugins/random-generator';

export { exportMarkingsJson, markingToJson } from './services/export/json-exporter';
export { exportMarkingsCsv } from './services/export/csv-exporter';

export { useKeyboardShortcuts, runShortcutAction } from './hooks/useKeyboardShortcuts';
export { ItemList } from './components/sidebar/ItemList';
export { LabelBar } from './components/sidebar/LabelBar';

export { createLogger, setLogLevel, getLogLevel } from './utils/logger';
export type { Logger, LogLevel } from './utils/logger';
export { createEventBus } from './utils/event-bus';
export type { EventBus, Listener, Unsubscribe } from './utils/event-bus';
export { SessionInvariantError } from './utils/errors';
export { matchesMetadata, metadataKey, MetadataSchema } from './utils/metadata';
export { parseDuration, formatInterval, formatTimestamp, formatDuration, formatIndexValue } from './utils/time';
