import type { Metadata } from '../../types/marking';
import type { DataItem } from '../../types/session';
import type { SessionStore } from '../../stores/session-store';
import { createLogger } from '../../utils/logger';
import { MetadataSchema } from '../../utils/metadata';
import { isSeries, isSeriesTable, seriesFromTable, seriesFromValues } from './series';

const logger = createLogger('loader');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumberArray(value: unknown[]): value is number[] {
  return value.every((v) => typeof v === 'number');
}

function preview(value: unknown): string {
  try {
    return (JSON.stringify(value) ?? String(value)).slice(0, 500);
  } catch {
    return String(value).slice(0, 500);
  }
}

/**
 * Flatten `container` into the session. Returns the items that were added;
 * values that are not understood are logged and skipped.
 */
export function loadSeries(session: SessionStore, container: unknown, name?: string): DataItem[] {
  const added: DataItem[] = [];
  const add = (series: unknown, itemName?: string | null, metadata?: Metadata | null) => {
    const result = session.getState().addItem(series, itemName, metadata);
    if (result.ok) added.push(result.value);
  };

  const visit = (value: unknown, valueName?: string): void => {
    if (Array.isArray(value)) {
      if (value.length === 0) {
        logger.debug('series container empty');
      } else if (isNumberArray(value)) {
        add(seriesFromValues(value), valueName);
      } else {
        for (const entry of value) visit(entry);
      }
      return;
    }

    if (isSeries(value)) {
      add(value, valueName);
      return;
    }

    if (isSeriesTable(value)) {
      for (const [column, series] of seriesFromTable(value)) add(series, column);
      return;
    }

    if (isRecord(value)) {
      if ('series' in value) {
        const metadata = MetadataSchema.safeParse(value.metadata ?? {});
        if (!metadata.success) {
          logger.error(`Metadata for ${preview(value.name)} is not a flat mapping, skipping`);
          return;
        }
        const recordName = typeof value.name === 'string' ? value.name : valueName;
        const series = Array.isArray(value.series) && isNumberArray(value.series)
          ? seriesFromValues(value.series)
          : value.series;
        add(series, recordName, metadata.data);
        return;
      }
      if ('index' in value && ('values' in value || 'columns' in value)) {
        // malformed series or table; let the session report why
        add(value, valueName);
        return;
      }
      for (const [key, sub] of Object.entries(value)) visit(sub, key);
      return;
    }

    logger.error(`Could not load object: ${preview(value)}`);
  };

  visit(container, name);
  return added;
}

/**
 * Parse JSON text and load its contents. Unnamed series get `<source>_<n>`.
 */
export function loadJson(session: SessionStore, text: string, source = ''): DataItem[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    logger.error(`Could not deserialize contents of ${source}: ${err instanceof Error ? err.message : String(err)}`);
    return [];
  }
  const entries = Array.isArray(parsed) && !isNumberArray(parsed) ? parsed : [parsed];
  const added: DataItem[] = [];
  entries.forEach((entry, idx) => {
    const unnamed = isSeries(entry) && entry.name === undefined;
    const items = loadSeries(session, entry, unnamed || Array.isArray(entry) ? `${source}_${idx}` : undefined);
    for (const item of items) {
      logger.info(`Loaded "${item.name}" (${item.series.index.length} values) from ${source}`);
    }
    added.push(...items);
  });
  return added;
}
