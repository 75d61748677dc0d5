import { ConversionError } from '../errors';
import { CONVERSION_MODES, ConversionMode, GridConverter } from './types';
import { DensityConverter } from './density';
import { EdgeConverter } from './edge';

export const isConversionMode = (value: string): value is ConversionMode =>
  CONVERSION_MODES.some(mode => mode === value);

export const parseConversionMode = (value: string): ConversionMode => {
  if (!isConversionMode(value)) {
    throw new ConversionError('UnknownMode', `Unknown mode '${value}'. Use 'standard' or 'edge'.`);
  }
  return value;
};

export const createConverter = (mode: ConversionMode): GridConverter => {
  switch (mode) {
    case 'standard':
      return new DensityConverter();
    case 'edge':
      return new EdgeConverter();
  }
};
