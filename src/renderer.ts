import { getPixel, RgbImage } from './image';
import { AsciiGrid } from './mapping/types';
import { RESET, rgbToAnsi } from './palette';
import { TextSink } from './logger';

/**
 * Writes the grid one row at a time, each character preceded by the escape
 * code of its co-located pixel's nearest ANSI color. Rows end with a reset so
 * colors never bleed into the next line, and one more reset follows the last row.
 *
 * The color source must be at least as large as the grid; a cell outside it
 * throws a RangeError.
 */
export const renderColored = (grid: AsciiGrid, original: RgbImage, out: TextSink = process.stdout): void => {
  grid.forEach((row, y) => {
    let line = '';
    row.forEach((ch, x) => {
      const { r, g, b } = getPixel(original, x, y);
      line += `${rgbToAnsi(r, g, b)}${ch}`;
    });
    out.write(`${line}${RESET}\n`);
  });

  out.write(RESET);
};
