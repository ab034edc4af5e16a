import { create } from 'zustand';
import { persist } from 'zustand/middleware';
import type { ShortcutBinding } from '../types/shortcuts';
import { DEFAULT_SHORTCUTS } from '../constants/default-shortcuts';
import { DEFAULT_GAP_LIMIT } from '../constants/view-config';
import { setLogLevel } from '../utils/logger';

interface SettingsState {
  shortcuts: ShortcutBinding[];
  defaultGapLimit: string;
  /** Batch operations (new markings, tagging, saving) target only visible items */
  onlyVisible: boolean;
  debug: boolean;

  updateShortcut: (id: string, update: Partial<ShortcutBinding>) => void;
  resetShortcuts: () => void;
  setDefaultGapLimit: (limit: string) => void;
  setOnlyVisible: (onlyVisible: boolean) => void;
  setDebug: (debug: boolean) => void;
}

export const useSettingsStore = create<SettingsState>()(
  persist(
    (set) => ({
      shortcuts: DEFAULT_SHORTCUTS,
      defaultGapLimit: DEFAULT_GAP_LIMIT,
      onlyVisible: true,
      debug: false,

      updateShortcut: (id, update) =>
        set((s) => ({
          shortcuts: s.shortcuts.map((sc) => (sc.id === id ? { ...sc, ...update } : sc)),
        })),
      resetShortcuts: () => set({ shortcuts: DEFAULT_SHORTCUTS }),
      setDefaultGapLimit: (limit) => set({ defaultGapLimit: limit }),
      setOnlyVisible: (onlyVisible) => set({ onlyVisible }),
      setDebug: (debug) => {
        setLogLevel(debug ? 'debug' : 'info');
        set({ debug });
      },
    }),
    {
      name: 'series-inspector-settings',
      onRehydrateStorage: () => (state) => {
        if (state?.debug) setLogLevel('debug');
      },
    }
  )
);
