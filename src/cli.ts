import { Command, InvalidArgumentError } from 'commander';
import { convertImageToAscii } from './converter';
import { logger as defaultLogger, Logger } from './logger';
import { parseConversionMode } from './mapping/factory';
import { ConversionMode } from './mapping/types';
import { getErrorMessage, isPositiveInteger } from './utils';
import pkg from '../package.json';

interface CliOptions {
  width?: number;
  mode: ConversionMode;
}

export const parseWidth = (value: string): number => {
  const numeric = /^\d+$/.test(value) ? Number(value) : NaN;
  if (!isPositiveInteger(numeric)) {
    throw new InvalidArgumentError('Width must be a positive integer.');
  }
  return numeric;
};

export const parseMode = (value: string): ConversionMode => {
  try {
    return parseConversionMode(value);
  } catch (err) {
    throw new InvalidArgumentError(getErrorMessage(err));
  }
};

export const createProgram = (logger: Logger = defaultLogger): Command =>
  new Command()
    .name('termascii')
    .description('Convert images to colorized ASCII art in the terminal.')
    .version(pkg.version, '-v, --version', 'Show version')
    .argument('<image>', 'Path to the input image file (PNG, JPEG, WebP, GIF, TIFF, AVIF)')
    .option('-w, --width <columns>', 'Override the output width in characters', parseWidth)
    .option('-m, --mode <mode>', 'Rendering mode: standard or edge', parseMode, 'standard')
    .helpOption('-h, --help', 'Show help')
    .action(async (imagePath: string, opts: CliOptions) => {
      try {
        await convertImageToAscii(
          imagePath,
          { width: opts.width ?? null, mode: opts.mode },
          { out: process.stdout, logger }
        );
      } catch (err) {
        logger.error(getErrorMessage(err));
        process.exit(1);
      }
    });
