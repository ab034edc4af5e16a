export const LINEWIDTH = 1.1;
export const DATA_ALPHA = 0.8;
export const SPAN_ALPHA = 0.3;

export const OUTLINE_SELECTION_COLOR = 'blue';
export const DETAIL_SELECTION_COLOR = 'red';

/** Fallback when a label has no color (should not happen for known labels) */
export const UNKNOWN_LABEL_COLOR = 'white';

// Series colors, assigned by display slot. The first 19 are the well separated ones.
export const COLORS: readonly string[] = [
  'blue', 'red', 'forestgreen',
  'magenta', 'darkorange', 'teal',
  'deeppink', 'navy', 'dodgerblue',
  'turquoise', 'darkviolet', 'darkred',
  'lime', 'gold', 'steelblue',
  'cyan', 'darkgreen', 'olive',
  'black',
  'peru', 'darkslategray', 'darkblue',
  'rosybrown', 'darkseagreen', 'indigo',
  'hotpink', 'salmon', 'orange',
  'fuchsia', 'purple', 'goldenrod',
  'darkslateblue', 'deepskyblue', 'dimgray',
];

export const REDRAW_DEBOUNCE_MS = 10;
