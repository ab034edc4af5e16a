export interface ShortcutBinding {
  id: string;
  action: ShortcutAction;
  key: string;
  ctrl?: boolean;
  shift?: boolean;
  alt?: boolean;
  description: string;
  category: 'labels' | 'navigation' | 'view' | 'editing' | 'storage';
}

export type ShortcutAction =
  | 'label-bfill'
  | 'label-ffill'
  | 'label-discard'
  | 'label-zero'
  | 'label-good'
  | 'label-comment'
  | 'label-linear-fill'
  | 'move-left'
  | 'move-right'
  | 'maximize-interval'
  | 'invert-visible'
  | 'hide-all'
  | 'toggle-vertex-markers'
  | 'toggle-steps'
  | 'delete-markings-in-interval'
  | 'tag-cleaned'
  | 'tag-cleaned-between-markings'
  | 'save-markings'
  | 'load-markings';
