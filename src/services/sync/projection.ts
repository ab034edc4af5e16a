import type { IndexKind } from '../../types/series';
import { MS_PER_DAY } from '../../utils/time';

/** Conversion between domain index values and plot-axis coordinates */
export interface AxisProjection {
  toAxis: (value: number) => number;
  fromAxis: (coordinate: number) => number;
}

/** Epoch ms ↔ fractional days since the epoch */
export const timeProjection: AxisProjection = {
  toAxis: (value) => value / MS_PER_DAY,
  fromAxis: (coordinate) => Math.round(coordinate * MS_PER_DAY),
};

export const identityProjection: AxisProjection = {
  toAxis: (value) => value,
  fromAxis: (coordinate) => coordinate,
};

export function projectionFor(kind: IndexKind | null): AxisProjection {
  return kind === 'time' ? timeProjection : identityProjection;
}
