export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

export interface AnsiColor extends RgbColor {
  name: string;
  code: string;
}

export const RESET = '\x1b[0m';

const ansi = (name: string, r: number, g: number, b: number, sgr: number): AnsiColor =>
  Object.freeze({ name, r, g, b, code: `\x1b[${sgr}m` });

// Declaration order is the tie-break order: the first entry at minimum distance wins.
export const ANSI_PALETTE: readonly AnsiColor[] = Object.freeze([
  ansi('black', 0, 0, 0, 30),
  ansi('red', 128, 0, 0, 31),
  ansi('green', 0, 128, 0, 32),
  ansi('yellow', 128, 128, 0, 33),
  ansi('blue', 0, 0, 128, 34),
  ansi('magenta', 128, 0, 128, 35),
  ansi('cyan', 0, 128, 128, 36),
  ansi('white', 192, 192, 192, 37),
  ansi('brightBlack', 128, 128, 128, 90),
  ansi('brightRed', 255, 0, 0, 91),
  ansi('brightGreen', 0, 255, 0, 92),
  ansi('brightYellow', 255, 255, 0, 93),
  ansi('brightBlue', 0, 0, 255, 94),
  ansi('brightMagenta', 255, 0, 255, 95),
  ansi('brightCyan', 0, 255, 255, 96),
  ansi('brightWhite', 255, 255, 255, 97)
]);

export const colorDistance = (a: RgbColor, b: RgbColor): number =>
  Math.sqrt((a.r - b.r) ** 2 + (a.g - b.g) ** 2 + (a.b - b.b) ** 2);

export const nearestAnsiColor = (color: RgbColor): AnsiColor => {
  let closest = ANSI_PALETTE[0];
  let minDistance = Number.POSITIVE_INFINITY;

  for (const entry of ANSI_PALETTE) {
    const distance = colorDistance(color, entry);
    if (distance < minDistance) {
      minDistance = distance;
      closest = entry;
    }
  }

  return closest;
};

/** Escape code of the palette entry nearest to (r, g, b) by Euclidean RGB distance. */
export const rgbToAnsi = (r: number, g: number, b: number): string => nearestAnsiColor({ r, g, b }).code;
