import type { Marking } from '../../types/marking';
import type { IndexKind } from '../../types/series';
import type { DataItem } from '../../types/session';
import { formatIndexValue } from '../../utils/time';

/** All-string view of a marking, as printed in logs and summaries */
export function markingToJson(marking: Marking, kind: IndexKind | null): Record<'start' | 'end' | 'label' | 'note', string> {
  return {
    start: formatIndexValue(marking.start, kind),
    end: formatIndexValue(marking.end, kind),
    label: marking.label,
    note: marking.note ?? '',
  };
}

interface JsonExportOptions {
  items: DataItem[];
  indexKind: IndexKind | null;
  exportedAt?: Date;
}

export function exportMarkingsJson({ items, indexKind, exportedAt = new Date() }: JsonExportOptions): string {
  return JSON.stringify(
    {
      exportedAt: exportedAt.toISOString(),
      indexKind,
      items: items.map((item) => ({
        name: item.name,
        metadata: item.metadata,
        markings: [...item.markings]
          .sort((a, b) => a.start - b.start)
          .map(({ start, end, label, note }) => ({ start, end, label, note })),
      })),
    },
    null,
    2
  );
}
