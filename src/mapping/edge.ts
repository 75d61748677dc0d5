import { canny } from '../edges/canny';
import { AsciiGrid, EDGE_CHAR, EDGE_VALUE, EMPTY_CHAR, GrayImage, GridConverter } from './types';
import { assertDimensions, buildGrid, grayReader } from './grid';

export const LOW_THRESHOLD = 50;
export const HIGH_THRESHOLD = 100;

// Anything other than exactly 255 counts as background, even malformed non-binary input.
export const mapEdge = (value: number): string => value === EDGE_VALUE ? EDGE_CHAR : EMPTY_CHAR;

export const detectAndConvert = (gray: GrayImage): AsciiGrid => {
  assertDimensions(gray.width, gray.height);
  const edges = canny(gray, LOW_THRESHOLD, HIGH_THRESHOLD);
  return buildGrid(edges.width, edges.height, grayReader(edges), mapEdge);
};

export class EdgeConverter implements GridConverter {
  convert(gray: GrayImage): AsciiGrid {
    return detectAndConvert(gray);
  }
}
