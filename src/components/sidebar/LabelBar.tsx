import { LABELS } from '../../constants/labels';
import { useSessionStore, type SessionStore } from '../../stores/session-store';

interface LabelBarProps {
  session: SessionStore;
}

export function LabelBar({ session }: LabelBarProps) {
  const activeLabel = useSessionStore(session, (s) => s.activeLabel);
  const setActiveLabel = useSessionStore(session, (s) => s.setActiveLabel);

  return (
    <div className="flex flex-wrap gap-1 px-3 py-2" role="toolbar" aria-label="Labels">
      {LABELS.map((label) => {
        const isActive = label.id === activeLabel;
        return (
          <button
            key={label.id}
            onClick={() => setActiveLabel(label.id)}
            aria-pressed={isActive}
            title={`${label.name} (Ctrl+${label.key.toUpperCase()})`}
            className={`flex items-center gap-1 px-2 py-1 rounded text-sm transition-colors ${
              isActive ? 'bg-accent/15 text-zinc-100' : 'text-zinc-400 hover:bg-surface-2'
            }`}
          >
            <span className="w-3 h-3 rounded-sm" style={{ backgroundColor: label.color }} />
            {label.id}
          </button>
        );
      })}
    </div>
  );
}
