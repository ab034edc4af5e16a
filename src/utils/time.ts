import type { IndexKind } from '../types/series';

export const MS_PER_SECOND = 1000;
export const MS_PER_MINUTE = 60 * MS_PER_SECOND;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

const DURATION_UNITS: Record<string, number> = {
  ms: 1,
  s: MS_PER_SECOND,
  sec: MS_PER_SECOND,
  min: MS_PER_MINUTE,
  t: MS_PER_MINUTE,
  h: MS_PER_HOUR,
  d: MS_PER_DAY,
};

/**
 * Parse a duration such as "20s", "500ms", "5min", "1h" or "2d" to milliseconds.
 * A bare number (or numeric string) is taken as milliseconds. Returns NaN on failure.
 */
export function parseDuration(input: string | number): number {
  if (typeof input === 'number') return Number.isFinite(input) ? input : NaN;
  const match = input.trim().toLowerCase().match(/^(\d+(?:\.\d+)?)\s*([a-z]*)$/);
  if (!match) return NaN;
  const amount = parseFloat(match[1]);
  const unit = match[2] === '' ? 'ms' : match[2];
  const factor = DURATION_UNITS[unit];
  return factor === undefined ? NaN : amount * factor;
}

function pad(n: number, width = 2): string {
  return n.toString().padStart(width, '0');
}

/** Format an epoch-ms timestamp as "YYYY-MM-DD HH:MM:SS" (UTC) */
export function formatTimestamp(ms: number): string {
  if (!Number.isFinite(ms)) return 'NaT';
  const d = new Date(ms);
  return (
    `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`
  );
}

/** Format a duration in ms as "[Nd ]HH:MM:SS.mmm" */
export function formatDuration(ms: number): string {
  const sign = ms < 0 ? '-' : '';
  let rest = Math.abs(Math.round(ms));
  const days = Math.floor(rest / MS_PER_DAY);
  rest -= days * MS_PER_DAY;
  const hours = Math.floor(rest / MS_PER_HOUR);
  rest -= hours * MS_PER_HOUR;
  const mins = Math.floor(rest / MS_PER_MINUTE);
  rest -= mins * MS_PER_MINUTE;
  const secs = Math.floor(rest / MS_PER_SECOND);
  const millis = rest - secs * MS_PER_SECOND;
  const clock = `${pad(hours)}:${pad(mins)}:${pad(secs)}.${pad(millis, 3)}`;
  return `${sign}${days > 0 ? `${days}d ` : ''}${clock}`;
}

export function formatIndexValue(value: number, kind: IndexKind | null): string {
  return kind === 'time' ? formatTimestamp(value) : String(value);
}

/** "start <==> end (width)" as used in log lines */
export function formatInterval(start: number, end: number, kind: IndexKind | null): string {
  const width = kind === 'time' ? formatDuration(end - start) : String(end - start);
  return `${formatIndexValue(start, kind)} <==> ${formatIndexValue(end, kind)} (${width})`;
}
