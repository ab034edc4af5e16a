import { REDRAW_DEBOUNCE_MS } from './theme';

/** Fraction of the first series shown in the detail view when it is loaded (1/n) */
export const FRACTION_PRESHOWN = 6;
export const MAX_PRESHOWN_POINTS = 50000;

/** Lower bound for the detail view's vertical span, avoids flat scales on constant data */
export const MINIMUM_Y_RANGE = 10;
export const Y_MARGIN_FRACTION = 0.02;

export const RESAMPLE_THRESHOLD = 8000;
export const RESAMPLED_POINTS = 2000;

export const DEFAULT_GAP_LIMIT = '20s';

export interface ViewConfig {
  fractionPreshown: number;
  maxPreshownPoints: number;
  minimumYRange: number;
  yMarginFraction: number;
  resampleThreshold: number;
  resampledPoints: number;
  redrawDelayMs: number;
}

export const DEFAULT_VIEW_CONFIG: Readonly<ViewConfig> = {
  fractionPreshown: FRACTION_PRESHOWN,
  maxPreshownPoints: MAX_PRESHOWN_POINTS,
  minimumYRange: MINIMUM_Y_RANGE,
  yMarginFraction: Y_MARGIN_FRACTION,
  resampleThreshold: RESAMPLE_THRESHOLD,
  resampledPoints: RESAMPLED_POINTS,
  redrawDelayMs: REDRAW_DEBOUNCE_MS,
};

export function resolveViewConfig(overrides: Partial<ViewConfig> = {}): ViewConfig {
  return { ...DEFAULT_VIEW_CONFIG, ...overrides };
}
