import { useState } from 'react';
import { COLORS } from '../../constants/theme';
import { useSessionStore, type SessionStore } from '../../stores/session-store';

interface ItemListProps {
  session: SessionStore;
}

/** Loaded items with color patch, visibility toggle and multi-row removal */
export function ItemList({ session }: ItemListProps) {
  const items = useSessionStore(session, (s) => s.items);
  const setItemVisible = useSessionStore(session, (s) => s.setItemVisible);
  const removeItems = useSessionStore(session, (s) => s.removeItems);
  const [selected, setSelected] = useState<string[]>([]);

  const liveSelection = selected.filter((id) => items.some((i) => i.id === id));

  const toggleSelected = (id: string, additive: boolean) => {
    setSelected((prev) => {
      if (!additive) return prev.length === 1 && prev[0] === id ? [] : [id];
      return prev.includes(id) ? prev.filter((s) => s !== id) : [...prev, id];
    });
  };

  return (
    <div className="flex flex-col">
      <div className="px-3 py-2 flex items-center justify-between">
        <span className="text-sm font-medium text-zinc-400 uppercase tracking-wider">Series</span>
        <button
          onClick={() => {
            removeItems(liveSelection.map((id) => ({ id })));
            setSelected([]);
          }}
          disabled={liveSelection.length === 0}
          className="text-sm text-accent hover:text-accent-hover transition-colors disabled:text-zinc-600"
        >
          Remove
        </button>
      </div>
      {items.length === 0 && (
        <p className="px-3 py-2 text-sm text-zinc-500">No series loaded</p>
      )}
      <ul>
        {items.map((item) => {
          const isSelected = liveSelection.includes(item.id);
          const color = COLORS[Math.min(item.colorSlot, COLORS.length - 1)];
          return (
            <li
              key={item.id}
              onClick={(e) => toggleSelected(item.id, e.ctrlKey || e.metaKey || e.shiftKey)}
              aria-selected={isSelected}
              className={`flex items-center gap-2 px-3 py-2 transition-colors cursor-pointer ${
                isSelected
                  ? 'bg-accent/15 border-l-2 border-accent'
                  : 'hover:bg-surface-2 border-l-2 border-transparent'
              }`}
            >
              <input
                type="checkbox"
                checked={item.visible}
                onClick={(e) => e.stopPropagation()}
                onChange={() => setItemVisible(item, !item.visible)}
                aria-label={item.visible ? `Hide ${item.name}` : `Show ${item.name}`}
              />
              <span
                className="w-3 h-3 rounded-sm"
                style={{ backgroundColor: color }}
                data-testid={`color-${item.id}`}
              />
              <span className="text-sm text-zinc-300 flex-1 truncate">{item.name}</span>
              <span className="text-xs text-zinc-500">{item.markings.length}</span>
            </li>
          );
        })}
      </ul>
    </div>
  );
}
