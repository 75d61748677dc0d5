export type ConversionMode = 'standard' | 'edge';

export const CONVERSION_MODES: readonly ConversionMode[] = ['standard', 'edge'];

export type AsciiGrid = string[][];

export interface GrayImage {
  width: number;
  height: number;
  data: Uint8Array;
}

export type SampleReader = (x: number, y: number) => number;

export type CharacterMapper = (sample: number) => string;

export interface GridConverter {
  convert(gray: GrayImage): AsciiGrid;
}

/** Ordered by visual density, darkest (space) to lightest (@). */
export const DENSITY_RAMP: readonly string[] = Object.freeze([' ', '.', ':', '-', '=', '+', '*', '#', '%', '@']);

export const EDGE_CHAR = '#';
export const EMPTY_CHAR = ' ';
export const EDGE_VALUE = 255;
