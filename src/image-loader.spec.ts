import fs from 'fs';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { catchConversionError } from './test-helpers';
import { computeTargetHeight, LoadedImage, loadImage, loadImageFromBuffer, preprocessImage } from './image-loader';

let tmpDir: string;

const writePng = async (name: string, width: number, height: number, channels: 3 | 4): Promise<string> => {
  const file = path.join(tmpDir, name);
  const background = channels === 4 ? { r: 200, g: 100, b: 50, alpha: 1 } : { r: 200, g: 100, b: 50 };
  await sharp({ create: { width, height, channels, background } }).png().toFile(file);
  return file;
};

beforeAll(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'termascii-loader-'));
});

afterAll(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('loadImage', () => {
  it('reports a missing file by the path it was given', async () => {
    const missing = path.join(tmpDir, 'does_not_exist.png');
    const err = await catchConversionError(() => loadImage(missing));
    expect(err.code).toBe('FileNotFound');
    expect(err.message).toBe(`Could not find image file "${missing}".`);
  });

  it('rejects a directory as an I/O error', async () => {
    const err = await catchConversionError(() => loadImage(tmpDir));
    expect(err.code).toBe('IoError');
    expect(err.message).toBe(`I/O error while accessing "${tmpDir}": not a regular file.`);
  });

  it('rejects files that are not images', async () => {
    const file = path.join(tmpDir, 'notes.png');
    fs.writeFileSync(file, 'plain text, not pixels');
    const err = await catchConversionError(() => loadImage(file));
    expect(err.code).toBe('UnsupportedFormat');
    expect(err.message).toBe(`Unsupported image format for file "${file}".`);
  });

  it('reports a truncated image as a decode failure', async () => {
    const png = await sharp({ create: { width: 32, height: 32, channels: 3, background: { r: 10, g: 20, b: 30 } } })
      .png()
      .toBuffer();
    const file = path.join(tmpDir, 'truncated.png');
    fs.writeFileSync(file, png.subarray(0, 40));

    const err = await catchConversionError(async () => preprocessImage(await loadImage(file), 20));
    expect(err.code).toBe('DecodeFailed');
    expect(err.message.startsWith(`Failed to decode image "${file}": `)).toBe(true);
  });

  it('reads dimensions', async () => {
    const file = await writePng('rgba.png', 6, 3, 4);
    const image = await loadImage(file);
    expect(image).toMatchObject({ label: file, width: 6, height: 3 });
  });
});

describe('computeTargetHeight', () => {
  it('halves the aspect-corrected height', () => {
    expect(computeTargetHeight(4, 4, 80)).toBe(40);
    expect(computeTargetHeight(200, 100, 80)).toBe(20);
    expect(computeTargetHeight(3, 1, 10)).toBe(2);
  });

  it('never returns less than one row', () => {
    expect(computeTargetHeight(1000, 1, 10)).toBe(1);
  });
});

describe('preprocessImage', () => {
  it('resizes to the target width with compressed height', async () => {
    const image = await loadImage(await writePng('square.png', 4, 4, 4));
    const { original, gray } = await preprocessImage(image, 80);
    expect([original.width, original.height]).toEqual([80, 40]);
    expect([gray.width, gray.height]).toEqual([80, 40]);
    expect(original.data).toHaveLength(80 * 40 * 3);
    expect(gray.data).toHaveLength(80 * 40);
  });

  it('accepts in-memory images', async () => {
    const png = await sharp({ create: { width: 10, height: 20, channels: 3, background: { r: 0, g: 0, b: 0 } } })
      .png()
      .toBuffer();
    const image = await loadImageFromBuffer(png);
    const { original } = await preprocessImage(image, 10);
    expect([original.width, original.height]).toEqual([10, 10]);
  });

  it('rejects a zero target width', async () => {
    const image = await loadImage(await writePng('zero.png', 4, 4, 3));
    const err = await catchConversionError(() => preprocessImage(image, 0));
    expect(err.code).toBe('InvalidDimensions');
    expect(err.message).toBe('Target width must be greater than zero.');
  });

  it('rejects a source with a zero dimension before resizing', async () => {
    const image: LoadedImage = { input: Buffer.alloc(0), label: 'empty', width: 0, height: 4 };
    const err = await catchConversionError(() => preprocessImage(image, 40));
    expect(err.code).toBe('InvalidDimensions');
    expect(err.message).toBe('Input image has invalid dimensions.');
  });
});
