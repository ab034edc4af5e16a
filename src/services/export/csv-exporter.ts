import type { IndexKind } from '../../types/series';
import type { DataItem } from '../../types/session';
import { formatIndexValue } from '../../utils/time';

/** Escape a CSV field: wrap in double-quotes and escape internal double-quotes */
function csvEscape(value: string): string {
  if (value.includes('"') || value.includes(',') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return `"${value}"`;
}

export function exportMarkingsCsv(items: DataItem[], indexKind: IndexKind | null): string {
  const rows = [['Item', 'Start', 'End', 'Width', 'Label', 'Note', 'Metadata'].join(',')];
  for (const item of items) {
    const markings = [...item.markings].sort((a, b) => a.start - b.start);
    for (const m of markings) {
      rows.push(
        [
          csvEscape(item.name),
          csvEscape(formatIndexValue(m.start, indexKind)),
          csvEscape(formatIndexValue(m.end, indexKind)),
          String(m.end - m.start),
          csvEscape(m.label),
          csvEscape(m.note ?? ''),
          csvEscape(JSON.stringify(item.metadata)),
        ].join(',')
      );
    }
  }

  // UTF-8 BOM for Excel compatibility
  return '\uFEFF' + rows.join('\n');
}
