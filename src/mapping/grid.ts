import { ConversionError } from '../errors';
import { isPositiveInteger } from '../utils';
import { AsciiGrid, CharacterMapper, GrayImage, SampleReader } from './types';

export const INVALID_DIMENSIONS_MESSAGE = 'Image dimensions must be greater than zero.';

export const assertDimensions = (width: number, height: number): void => {
  if (!isPositiveInteger(width) || !isPositiveInteger(height)) {
    throw new ConversionError('InvalidDimensions', INVALID_DIMENSIONS_MESSAGE);
  }
};

export const grayReader = (gray: GrayImage): SampleReader =>
  (x, y) => gray.data[y * gray.width + x];

export const buildGrid = (
  width: number,
  height: number,
  sampleAt: SampleReader,
  map: CharacterMapper
): AsciiGrid => {
  assertDimensions(width, height);

  const grid: AsciiGrid = [];
  for (let y = 0; y < height; y++) {
    const row: string[] = [];
    for (let x = 0; x < width; x++) {
      row.push(map(sampleAt(x, y)));
    }
    grid.push(row);
  }

  return grid;
};
