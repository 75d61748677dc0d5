import { loadImage, preprocessImage } from './image-loader';
import { createLogger, Logger, TextSink } from './logger';
import { createConverter } from './mapping/factory';
import { ConversionMode } from './mapping/types';
import { renderColored } from './renderer';
import { resolveOutputWidth, TerminalStream, WidthResolution } from './terminal';

export interface ConvertOptions {
  width?: number | null;
  mode: ConversionMode;
}

export interface ConvertIO {
  out: TextSink;
  logger: Logger;
  terminal?: TerminalStream;
}

export const emitWidthMessages = ({ width, source }: WidthResolution, logger: Logger): void => {
  switch (source) {
    case 'user':
      return;
    case 'auto-detected':
      logger.info(`Using auto-detected width: ${width} characters`);
      return;
    case 'fallback':
      logger.warn(`Unable to detect terminal size; defaulting to ${width} characters.`);
      logger.info(`Using fallback width: ${width} characters`);
      return;
  }
};

const defaultIO = (): ConvertIO => ({ out: process.stdout, logger: createLogger() });

/**
 * Full pipeline: width resolution, decode, resize, character mapping, colored render.
 * Nothing is rendered unless every earlier step succeeds.
 */
export const convertImageToAscii = async (
  imagePath: string,
  options: ConvertOptions,
  io: ConvertIO = defaultIO()
): Promise<WidthResolution> => {
  const resolution = resolveOutputWidth(options.width, io.terminal);
  emitWidthMessages(resolution, io.logger);

  const image = await loadImage(imagePath);
  const processed = await preprocessImage(image, resolution.width);
  const grid = createConverter(options.mode).convert(processed.gray);

  renderColored(grid, processed.original, io.out);
  return resolution;
};
