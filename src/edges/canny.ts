import { GrayImage } from '../mapping/types';
import { clamp } from '../utils';

export const BLUR_SIGMA = 1.4;

const EDGE = 255;
const NONE = 0;

const gaussianKernel = (sigma: number): Float32Array => {
  const radius = Math.ceil(sigma * 3);
  const kernel = new Float32Array(radius * 2 + 1);
  let sum = 0;
  for (let i = -radius; i <= radius; i++) {
    const weight = Math.exp(-(i * i) / (2 * sigma * sigma));
    kernel[i + radius] = weight;
    sum += weight;
  }
  for (let i = 0; i < kernel.length; i++) {
    kernel[i] /= sum;
  }
  return kernel;
};

// Separable blur; samples past the border repeat the nearest edge pixel.
const gaussianBlur = (src: Float32Array, width: number, height: number, sigma: number): Float32Array => {
  const kernel = gaussianKernel(sigma);
  const radius = (kernel.length - 1) / 2;
  const horizontal = new Float32Array(src.length);
  const out = new Float32Array(src.length);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let acc = 0;
      for (let k = -radius; k <= radius; k++) {
        acc += src[y * width + clamp(x + k, 0, width - 1)] * kernel[k + radius];
      }
      horizontal[y * width + x] = acc;
    }
  }

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let acc = 0;
      for (let k = -radius; k <= radius; k++) {
        acc += horizontal[clamp(y + k, 0, height - 1) * width + x] * kernel[k + radius];
      }
      out[y * width + x] = acc;
    }
  }

  return out;
};

interface Gradient {
  gx: Float32Array;
  gy: Float32Array;
  mag: Float32Array;
}

const sobel = (src: Float32Array, width: number, height: number): Gradient => {
  const gx = new Float32Array(src.length);
  const gy = new Float32Array(src.length);
  const mag = new Float32Array(src.length);
  const at = (x: number, y: number) => src[clamp(y, 0, height - 1) * width + clamp(x, 0, width - 1)];

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const tl = at(x - 1, y - 1);
      const tc = at(x, y - 1);
      const tr = at(x + 1, y - 1);
      const ml = at(x - 1, y);
      const mr = at(x + 1, y);
      const bl = at(x - 1, y + 1);
      const bc = at(x, y + 1);
      const br = at(x + 1, y + 1);

      const gxi = -tl - 2 * ml - bl + tr + 2 * mr + br;
      const gyi = -tl - 2 * tc - tr + bl + 2 * bc + br;
      const i = y * width + x;
      gx[i] = gxi;
      gy[i] = gyi;
      mag[i] = Math.hypot(gxi, gyi);
    }
  }

  return { gx, gy, mag };
};

// Neighbour offsets across the gradient for directions 0, 45, 90 and 135 degrees.
const DIRECTION_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [1, 0],
  [1, 1],
  [0, 1],
  [-1, 1]
];

const directionIndex = (gx: number, gy: number): number => {
  let angle = (Math.atan2(gy, gx) * 180) / Math.PI;
  if (angle < 0) angle += 180;
  return Math.round(angle / 45) % 4;
};

const suppressNonMaxima = ({ gx, gy, mag }: Gradient, width: number, height: number): Float32Array => {
  const thin = new Float32Array(mag.length);
  const magAt = (x: number, y: number) =>
    x < 0 || y < 0 || x >= width || y >= height ? 0 : mag[y * width + x];

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = y * width + x;
      const m = mag[i];
      if (m === 0) continue;
      const [dx, dy] = DIRECTION_OFFSETS[directionIndex(gx[i], gy[i])];
      if (m >= magAt(x + dx, y + dy) && m >= magAt(x - dx, y - dy)) {
        thin[i] = m;
      }
    }
  }

  return thin;
};

const hysteresis = (thin: Float32Array, width: number, height: number, low: number, high: number): Uint8Array => {
  const out = new Uint8Array(thin.length).fill(NONE);
  const stack: number[] = [];

  for (let i = 0; i < thin.length; i++) {
    if (thin[i] >= high && out[i] === NONE) {
      out[i] = EDGE;
      stack.push(i);

      for (let current = stack.pop(); current !== undefined; current = stack.pop()) {
        const cx = current % width;
        const cy = Math.floor(current / width);

        for (let ny = cy - 1; ny <= cy + 1; ny++) {
          for (let nx = cx - 1; nx <= cx + 1; nx++) {
            if (nx < 0 || ny < 0 || nx >= width || ny >= height) continue;
            const n = ny * width + nx;
            if (out[n] === NONE && thin[n] >= low) {
              out[n] = EDGE;
              stack.push(n);
            }
          }
        }
      }
    }
  }

  return out;
};

/**
 * Canny edge detection. Returns an image of the same size whose samples are
 * exactly 0 or 255.
 */
export const canny = (gray: GrayImage, low: number, high: number): GrayImage => {
  const { width, height } = gray;
  const blurred = gaussianBlur(Float32Array.from(gray.data), width, height, BLUR_SIGMA);
  const gradient = sobel(blurred, width, height);
  const thin = suppressNonMaxima(gradient, width, height);
  return { width, height, data: hysteresis(thin, width, height, low, high) };
};
