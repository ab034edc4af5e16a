import type { ShortcutBinding } from '../types/shortcuts';

export const DEFAULT_SHORTCUTS: ShortcutBinding[] = [
  // Labels
  { id: 'label-bfill', action: 'label-bfill', key: 'b', ctrl: true, description: 'Label: backward fill', category: 'labels' },
  { id: 'label-ffill', action: 'label-ffill', key: 'n', ctrl: true, description: 'Label: forward fill', category: 'labels' },
  { id: 'label-discard', action: 'label-discard', key: 'd', ctrl: true, description: 'Label: discard', category: 'labels' },
  { id: 'label-zero', action: 'label-zero', key: 'z', ctrl: true, description: 'Label: zero', category: 'labels' },
  { id: 'label-good', action: 'label-good', key: 'j', ctrl: true, description: 'Label: good', category: 'labels' },
  { id: 'label-comment', action: 'label-comment', key: 'c', ctrl: true, description: 'Label: comment', category: 'labels' },
  { id: 'label-linear-fill', action: 'label-linear-fill', key: 'w', ctrl: true, description: 'Label: linear fill', category: 'labels' },

  // Navigation
  { id: 'move-left', action: 'move-left', key: '-', description: 'Move interval left', category: 'navigation' },
  { id: 'move-right', action: 'move-right', key: ' ', description: 'Move interval right', category: 'navigation' },
  { id: 'maximize-interval', action: 'maximize-interval', key: 'k', description: 'Show maximal interval', category: 'navigation' },

  // View
  { id: 'invert-visible', action: 'invert-visible', key: 'i', description: 'Invert visible items', category: 'view' },
  { id: 'hide-all', action: 'hide-all', key: 'h', description: 'Hide all items', category: 'view' },
  { id: 'toggle-vertex-markers', action: 'toggle-vertex-markers', key: 'm', description: 'Toggle vertex markers', category: 'view' },
  { id: 'toggle-steps', action: 'toggle-steps', key: 's', description: 'Toggle step draw style', category: 'view' },

  // Editing
  { id: 'delete-markings-in-interval', action: 'delete-markings-in-interval', key: 'r', ctrl: true, description: 'Delete visible markings in interval', category: 'editing' },

  // Storage
  { id: 'save-markings', action: 'save-markings', key: 's', ctrl: true, description: 'Save markings', category: 'storage' },
  { id: 'load-markings', action: 'load-markings', key: 'l', ctrl: true, description: 'Load markings', category: 'storage' },
  { id: 'tag-cleaned', action: 'tag-cleaned', key: 'c', ctrl: true, shift: true, description: 'Save series as cleaned', category: 'storage' },
  { id: 'tag-cleaned-between-markings', action: 'tag-cleaned-between-markings', key: 'o', ctrl: true, shift: true, description: 'Save series as cleaned between outer markings', category: 'storage' },
];
