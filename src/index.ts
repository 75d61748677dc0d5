export { ConversionError } from './errors';
export type { ConversionErrorCode } from './errors';
export { mapBrightness, convertToAscii } from './mapping/density';
export { mapEdge, detectAndConvert } from './mapping/edge';
export { buildGrid } from './mapping/grid';
export { createConverter, parseConversionMode } from './mapping/factory';
export { DENSITY_RAMP } from './mapping/types';
export type { AsciiGrid, ConversionMode, GrayImage } from './mapping/types';
export { canny } from './edges/canny';
export { ANSI_PALETTE, RESET, rgbToAnsi, nearestAnsiColor } from './palette';
export type { AnsiColor, RgbColor } from './palette';
export { computeOutputWidth, resolveOutputWidth, getTerminalWidth } from './terminal';
export type { TerminalStream, WidthResolution, WidthSource } from './terminal';
export { loadImage, loadImageFromBuffer, preprocessImage } from './image-loader';
export type { LoadedImage, ProcessedImage } from './image-loader';
export type { RgbImage } from './image';
export { renderColored } from './renderer';
export { convertImageToAscii } from './converter';
