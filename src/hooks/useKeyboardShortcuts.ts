import { useEffect, useCallback } from 'react';
import { useSettingsStore } from '../stores/settings-store';
import { CLEANED, LABEL_IDS } from '../constants/labels';
import type { InspectorController } from '../services/sync/inspector-controller';
import type { ShortcutAction, ShortcutBinding } from '../types/shortcuts';

/** Check whether a keyboard event matches a shortcut binding */
function matchesShortcut(e: KeyboardEvent, binding: ShortcutBinding): boolean {
  const key = e.key.toLowerCase();
  const ctrl = e.ctrlKey || e.metaKey;
  return key === binding.key.toLowerCase()
    && ctrl === (binding.ctrl ?? false)
    && e.shiftKey === (binding.shift ?? false)
    && e.altKey === (binding.alt ?? false);
}

/** Run one shortcut action against the controller and its session */
export function runShortcutAction(controller: InspectorController, action: ShortcutAction): void {
  const session = controller.session.getState();
  const { onlyVisible } = useSettingsStore.getState();

  const label = LABEL_IDS.find((id) => `label-${id}` === action);
  if (label) {
    session.setActiveLabel(label);
    return;
  }

  switch (action) {
    case 'move-left':
      controller.moveInterval('left');
      break;
    case 'move-right':
      controller.moveInterval('right');
      break;
    case 'maximize-interval':
      controller.maximizeInterval();
      break;
    case 'invert-visible':
      session.setItemsVisible('invert');
      break;
    case 'hide-all':
      session.setItemsVisible(false);
      break;
    case 'toggle-vertex-markers':
      controller.toggleVertexMarkers();
      break;
    case 'toggle-steps':
      controller.toggleStepDrawStyle();
      break;
    case 'delete-markings-in-interval':
      controller.deleteVisibleMarkingsInDisplayedInterval();
      break;
    case 'tag-cleaned':
      session.tagItems(CLEANED, onlyVisible);
      break;
    case 'tag-cleaned-between-markings':
      session.tagItemsBetweenOuterMarkings(CLEANED, onlyVisible);
      break;
    case 'save-markings':
      session.saveSnapshot(onlyVisible);
      break;
    case 'load-markings':
      session.loadMarkings(onlyVisible, false);
      break;
    default:
      break;
  }
}

export function useKeyboardShortcuts(controller: InspectorController | null) {
  const handleKeyDown = useCallback((e: KeyboardEvent) => {
    if (!controller) return;

    // Don't capture when typing in inputs
    const target = e.target;
    if (
      target instanceof HTMLElement &&
      (target.tagName === 'INPUT' || target.tagName === 'TEXTAREA' || target.isContentEditable)
    ) {
      return;
    }

    const binding = useSettingsStore.getState().shortcuts.find((s) => matchesShortcut(e, s));
    if (!binding) return;
    e.preventDefault();
    runShortcutAction(controller, binding.action);
  }, [controller]);

  useEffect(() => {
    window.addEventListener('keydown', handleKeyDown);
    return () => {
      window.removeEventListener('keydown', handleKeyDown);
    };
  }, [handleKeyDown]);
}
