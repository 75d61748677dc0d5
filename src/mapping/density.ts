import { clamp } from '../utils';
import { AsciiGrid, DENSITY_RAMP, GrayImage, GridConverter } from './types';
import { buildGrid, grayReader } from './grid';

const MAX_INDEX = DENSITY_RAMP.length - 1;

/**
 * Maps a brightness sample (0-255) onto the density ramp.
 * 0 gives a space, 255 gives `@`; the mapping never decreases as brightness grows.
 */
export const mapBrightness = (brightness: number): string => {
  // Math.round is half-up, which matches half-away-from-zero on non-negative input.
  const index = clamp(Math.round((brightness / 255) * MAX_INDEX), 0, MAX_INDEX);
  return DENSITY_RAMP[index];
};

export const convertToAscii = (gray: GrayImage): AsciiGrid =>
  buildGrid(gray.width, gray.height, grayReader(gray), mapBrightness);

export class DensityConverter implements GridConverter {
  convert(gray: GrayImage): AsciiGrid {
    return convertToAscii(gray);
  }
}
