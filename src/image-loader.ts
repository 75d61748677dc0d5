import fs from 'fs';
import sharp from 'sharp';
import { ConversionError } from './errors';
import { RGB_CHANNELS, RgbImage, toGrayscale } from './image';
import { GrayImage } from './mapping/types';
import { getErrorMessage, isPositiveInteger } from './utils';

/** Terminal cells are about twice as tall as they are wide. */
export const CELL_ASPECT_COMPRESSION = 2;

export interface LoadedImage {
  input: string | Buffer;
  label: string;
  width: number;
  height: number;
}

export interface ProcessedImage {
  original: RgbImage;
  gray: GrayImage;
}

const hasCode = (err: unknown, code: string): boolean =>
  typeof err === 'object' && err !== null && 'code' in err && err.code === code;

const mapIoError = (err: unknown, imagePath: string): ConversionError =>
  hasCode(err, 'ENOENT')
    ? new ConversionError('FileNotFound', `Could not find image file "${imagePath}".`)
    : new ConversionError('IoError', `I/O error while accessing "${imagePath}": ${getErrorMessage(err)}`);

const mapDecodeError = (err: unknown, label: string): ConversionError => {
  const detail = getErrorMessage(err);
  if (/unsupported image format/i.test(detail)) {
    return new ConversionError('UnsupportedFormat', `Unsupported image format for file "${label}".`);
  }
  return new ConversionError('DecodeFailed', `Failed to decode image "${label}": ${detail}`);
};

const readMetadata = async (input: string | Buffer, label: string): Promise<LoadedImage> => {
  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(input).metadata();
  } catch (err) {
    throw mapDecodeError(err, label);
  }

  const width = metadata.width ?? 0;
  const height = metadata.height ?? 0;
  // EXIF orientations 5-8 rotate by 90 degrees; the resize happens after auto-orientation.
  const rotated = (metadata.orientation ?? 1) >= 5;

  return {
    input,
    label,
    width: rotated ? height : width,
    height: rotated ? width : height
  };
};

export const loadImage = async (imagePath: string): Promise<LoadedImage> => {
  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(imagePath);
  } catch (err) {
    throw mapIoError(err, imagePath);
  }
  if (!stats.isFile()) {
    throw new ConversionError('IoError', `I/O error while accessing "${imagePath}": not a regular file.`);
  }

  return readMetadata(imagePath, imagePath);
};

export const loadImageFromBuffer = (data: Buffer, label = '<buffer>'): Promise<LoadedImage> =>
  readMetadata(data, label);

export const computeTargetHeight = (sourceWidth: number, sourceHeight: number, targetWidth: number): number =>
  Math.max(1, Math.round((targetWidth * sourceHeight) / sourceWidth / CELL_ASPECT_COMPRESSION));

/**
 * Resizes the image to `targetWidth` columns and returns the color buffer
 * together with a grayscale buffer of identical size.
 */
export const preprocessImage = async (image: LoadedImage, targetWidth: number): Promise<ProcessedImage> => {
  if (!isPositiveInteger(targetWidth)) {
    throw new ConversionError('InvalidDimensions', 'Target width must be greater than zero.');
  }
  if (!isPositiveInteger(image.width) || !isPositiveInteger(image.height)) {
    throw new ConversionError('InvalidDimensions', 'Input image has invalid dimensions.');
  }

  const targetHeight = computeTargetHeight(image.width, image.height, targetWidth);

  let resized: { data: Buffer; info: sharp.OutputInfo };
  try {
    resized = await sharp(image.input)
      .rotate()
      .resize({ width: targetWidth, height: targetHeight, fit: 'fill', kernel: 'lanczos3' })
      .removeAlpha()
      .toColourspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });
  } catch (err) {
    throw mapDecodeError(err, image.label);
  }

  const { data, info } = resized;
  if (info.channels !== RGB_CHANNELS) {
    throw new ConversionError(
      'DecodeFailed',
      `Failed to decode image "${image.label}": expected ${RGB_CHANNELS} channels, got ${info.channels}.`
    );
  }

  const original: RgbImage = { width: info.width, height: info.height, data };
  return { original, gray: toGrayscale(original) };
};
