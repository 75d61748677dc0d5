export const WIDTH_MARGIN = 2;
export const MIN_WIDTH = 40;
export const FALLBACK_WIDTH = 80;

export type WidthSource = 'user' | 'auto-detected' | 'fallback';

export interface WidthResolution {
  width: number;
  source: WidthSource;
}

export interface TerminalStream {
  isTTY?: boolean;
  columns?: number;
}

/** Column count of a TTY stream, or null when it is not a terminal or reports no size. */
export const getTerminalWidth = (stream: TerminalStream = process.stdout): number | null => {
  if (!stream.isTTY) return null;
  const { columns } = stream;
  return typeof columns === 'number' && columns > 0 ? columns : null;
};

const applyMargin = (width: number): number => Math.max(0, width - WIDTH_MARGIN);

/**
 * An explicit width is taken as-is. A detected width loses the margin and is
 * raised to MIN_WIDTH; with neither, FALLBACK_WIDTH is used.
 */
export const computeOutputWidth = (userWidth?: number | null, detectedWidth?: number | null): WidthResolution => {
  if (userWidth != null) {
    return { width: userWidth, source: 'user' };
  }
  if (detectedWidth != null) {
    return { width: Math.max(MIN_WIDTH, applyMargin(detectedWidth)), source: 'auto-detected' };
  }
  return { width: FALLBACK_WIDTH, source: 'fallback' };
};

export const resolveOutputWidth = (userWidth?: number | null, stream?: TerminalStream): WidthResolution =>
  computeOutputWidth(userWidth, getTerminalWidth(stream));
