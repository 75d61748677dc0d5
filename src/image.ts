import { RgbColor } from './palette';
import { GrayImage } from './mapping/types';

export const RGB_CHANNELS = 3;

export interface RgbImage {
  width: number;
  height: number;
  /** Row-major, three bytes per pixel. */
  data: Buffer;
}

export const getPixel = (image: RgbImage, x: number, y: number): RgbColor => {
  if (x < 0 || y < 0 || x >= image.width || y >= image.height) {
    throw new RangeError(`Pixel (${x}, ${y}) is outside the ${image.width}x${image.height} color source.`);
  }
  const offset = (y * image.width + x) * RGB_CHANNELS;
  return { r: image.data[offset], g: image.data[offset + 1], b: image.data[offset + 2] };
};

const LUMA_R = 0.2126;
const LUMA_G = 0.7152;
const LUMA_B = 0.0722;

export const toGrayscale = (image: RgbImage): GrayImage => {
  const pixels = image.width * image.height;
  const data = new Uint8Array(pixels);
  for (let i = 0; i < pixels; i++) {
    const offset = i * RGB_CHANNELS;
    const luma = LUMA_R * image.data[offset] + LUMA_G * image.data[offset + 1] + LUMA_B * image.data[offset + 2];
    data[i] = Math.min(255, Math.round(luma));
  }
  return { width: image.width, height: image.height, data };
};
