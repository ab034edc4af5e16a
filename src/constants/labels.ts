export const LABEL_IDS = ['bfill', 'ffill', 'discard', 'zero', 'good', 'comment', 'linear-fill'] as const;

export type Label = (typeof LABEL_IDS)[number];

export interface LabelDefinition {
  id: Label;
  /** Shortcut key (pressed with Ctrl) */
  key: string;
  name: string;
  color: string;
}

export const LABEL_COLOR_MAP: Readonly<Record<Label, string>> = {
  bfill: 'darkviolet',
  ffill: 'salmon',
  discard: 'orange',
  zero: 'steelblue',
  good: 'green',
  comment: 'darkseagreen',
  'linear-fill': 'hotpink',
};

export const LABELS: readonly LabelDefinition[] = [
  { id: 'bfill', key: 'b', name: 'Backward fill', color: LABEL_COLOR_MAP.bfill },
  { id: 'ffill', key: 'n', name: 'Forward fill', color: LABEL_COLOR_MAP.ffill },
  { id: 'discard', key: 'd', name: 'Discard', color: LABEL_COLOR_MAP.discard },
  { id: 'zero', key: 'z', name: 'Zero', color: LABEL_COLOR_MAP.zero },
  { id: 'good', key: 'j', name: 'Good', color: LABEL_COLOR_MAP.good },
  { id: 'comment', key: 'c', name: 'Comment', color: LABEL_COLOR_MAP.comment },
  { id: 'linear-fill', key: 'w', name: 'Linear fill', color: LABEL_COLOR_MAP['linear-fill'] },
];

/** Tag used when saving an interval as cleaned */
export const CLEANED = 'cleaned';

export function isLabel(value: unknown): value is Label {
  return typeof value === 'string' && LABEL_IDS.some((id) => id === value);
}
