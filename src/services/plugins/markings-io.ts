import type { Label } from '../../constants/labels';
import { useSettingsStore } from '../../stores/settings-store';
import type { Metadata } from '../../types/marking';
import type { SessionEventMap, SessionSnapshot, SnapshotEntry } from '../../types/session';
import { createLogger } from '../../utils/logger';
import { metadataKey } from '../../utils/metadata';
import { detectGaps } from '../analysis/gap-detection';
import { toRecord, type MarkingsTable } from '../storage/markings-table';
import type { InspectorPlugin, PluginAction, PluginFactory, PluginHost, SlotBindings } from './types';

const logger = createLogger('io');

export const MARKINGS_IO = 'MarkingsIO';

export interface MarkingsIOOptions {
  table: MarkingsTable;
  /** Defaults to the gap limit in the settings store */
  gapLimit?: string;
  gapLabel?: Label;
}

function describeMetadata(metadata: Metadata): string {
  return JSON.stringify(metadata);
}

/**
 * Saves session markings to a MarkingsTable and loads them back. Storage
 * calls run one at a time in request order.
 */
export class MarkingsIO implements InspectorPlugin {
  readonly name = MARKINGS_IO;
  readonly actions: readonly PluginAction[];
  readonly slotBindings: SlotBindings;
  private readonly table: MarkingsTable;
  private readonly gapLimit: string | undefined;
  private readonly gapLabel: Label;
  private readonly alreadyLoaded = new Set<string>();
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly host: PluginHost,
    { table, gapLimit, gapLabel = 'discard' }: MarkingsIOOptions
  ) {
    this.table = table;
    this.gapLimit = gapLimit;
    this.gapLabel = gapLabel;
    this.actions = [{ name: 'Auto-mark gaps', run: () => this.autoMarkGaps() }];
    this.slotBindings = {
      markingsSaved: (snapshot) => {
        void this.saveMarkings(snapshot);
      },
      loadMarkingsRequested: (request) => {
        void this.loadMarkings(request);
      },
    };
  }

  /** Resolves once every queued storage call has settled */
  whenIdle(): Promise<void> {
    return this.queue;
  }

  private enqueue(description: string, task: () => Promise<void>): Promise<void> {
    this.queue = this.queue.then(task).catch((err: unknown) => {
      logger.error(`${description} failed: ${err instanceof Error ? err.message : String(err)}`);
    });
    return this.queue;
  }

  saveMarkings({ changed, deleted }: SessionSnapshot): Promise<void> {
    return this.enqueue('Saving markings', async () => {
      for (const entry of changed) {
        await this.upsertMarkings(entry);
      }
      const acknowledged: SnapshotEntry[] = [];
      for (const entry of deleted) {
        await this.deleteMarkings(entry);
        acknowledged.push(entry);
      }
      this.host.acknowledgeDeletes(acknowledged);
    });
  }

  private async upsertMarkings({ metadata, markings }: SnapshotEntry): Promise<void> {
    const written = await this.table.upsertMarkings(metadata, markings.map(toRecord));
    logger.info(`Updated/inserted ${written} markings for ${describeMetadata(metadata)}`);
  }

  private async deleteMarkings({ metadata, markings }: SnapshotEntry): Promise<void> {
    if (metadata.is_total === true) {
      logger.info(`Skipping 'totals': ${describeMetadata(metadata)}`);
      return;
    }
    if (markings.length === 0) return;
    const ranges = markings.map(({ start, end }) => ({ start, end }));
    await this.table.deleteMarkings(metadata, ranges);
    logger.info(`Deleted ${ranges.length} markings for ${describeMetadata(metadata)}`);
  }

  loadMarkings({ metadata, start, end, force }: SessionEventMap['loadMarkingsRequested']): Promise<void> {
    const key = metadataKey(metadata);
    if (!force && this.alreadyLoaded.has(key)) {
      logger.info(
        `Markings have already been loaded once for this data (${describeMetadata(metadata)}). ` +
          'Use force to load them on top of the previous ones, and avoid saving the duplicates.'
      );
      return this.queue;
    }
    this.alreadyLoaded.add(key);
    return this.enqueue('Loading markings', async () => {
      try {
        const rows = await this.table.getMarkings(metadata);
        const inRange = rows.filter((m) => start <= m.start && m.start <= end && start <= m.end && m.end <= end);
        this.host.newMarkings(inRange, metadata);
      } catch (err) {
        this.alreadyLoaded.delete(key);
        throw err;
      }
    });
  }

  /** Mark index gaps wider than the limit on every visible item */
  autoMarkGaps(
    gapLimit: string = this.gapLimit ?? useSettingsStore.getState().defaultGapLimit,
    label: string = this.gapLabel
  ): void {
    this.host.applyOnVisible((series, metadata) => {
      const records = detectGaps(series, gapLimit, label);
      if (records === null) return;
      logger.info(`Found ${records.length} gaps longer than ${gapLimit}`);
      this.host.newMarkings(records, metadata);
    });
  }

  destroy(): void {
    this.alreadyLoaded.clear();
  }
}

export function markingsIOPlugin(options: MarkingsIOOptions): PluginFactory {
  return {
    name: MARKINGS_IO,
    create: (host) => new MarkingsIO(host, options),
  };
}
