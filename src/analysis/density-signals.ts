import { mean } from '../../libs/common/src/collections';
import { colorDifference, FrameImage } from './frame-image';

export const GRID_SIZE = 32;
export const EDGE_THRESHOLD = 50;
export const TEXTURE_WINDOW = 16;

const QUICK_STRIDE = 10;
const SAMPLE_STRIDE = 5;
const MOTION_THRESHOLD = 30;
const FOREGROUND_THRESHOLD = 30;
const DARK_PIXEL_THRESHOLD = 100;

const PIXELS_PER_PERSON_SPARSE = 5000;
const PIXELS_PER_PERSON_DENSE = 2500;
const PIXELS_PER_PERSON_PACKED = 1500;

export const SIGNAL_WEIGHTS = Object.freeze({ edge: 0.3, texture: 0.25, motion: 0.2, foreground: 0.25 });

export interface GrayPlane {
  width: number;
  height: number;
  values: Uint8Array;
}

export interface DensitySignals {
  edge: number;
  texture: number;
  motion: number;
  foreground: number;
}

/**
 * Coarse edge ratio used by the mode switch. Every sample counts towards the
 * total; only samples with a left and an upper neighbour can be edges.
 */
export function quickDensity(image: FrameImage): number {
  let edges = 0;
  let samples = 0;
  for (let y = 0; y < image.height; y += QUICK_STRIDE) {
    for (let x = 0; x < image.width; x += QUICK_STRIDE) {
      if (x > 0 && y > 0) {
        const diff =
          colorDifference(image, x, y, image, x - QUICK_STRIDE, y) +
          colorDifference(image, x, y, image, x, y - QUICK_STRIDE);
        if (diff > EDGE_THRESHOLD * 2) {
          edges++;
        }
      }
      samples++;
    }
  }
  return samples > 0 ? edges / samples : 0;
}

const SOBEL_X = [-1, 0, 1, -2, 0, 2, -1, 0, 1];
const SOBEL_Y = [-1, -2, -1, 0, 0, 0, 1, 2, 1];

export function edgeDensity(gray: GrayPlane): number {
  const { width, height, values } = gray;
  let edges = 0;
  for (let y = 1; y < height - 1; y++) {
    for (let x = 1; x < width - 1; x++) {
      let gx = 0;
      let gy = 0;
      let k = 0;
      for (let dy = -1; dy <= 1; dy++) {
        for (let dx = -1; dx <= 1; dx++) {
          const v = values[(y + dy) * width + (x + dx)];
          gx += v * SOBEL_X[k];
          gy += v * SOBEL_Y[k];
          k++;
        }
      }
      if (Math.sqrt(gx * gx + gy * gy) > EDGE_THRESHOLD) {
        edges++;
      }
    }
  }
  return (edges / (width * height)) * 10;
}

/** Windows start at multiples of the window size strictly below `dimension - window`. */
export function textureDensity(gray: GrayPlane): number {
  const { width, height, values } = gray;
  const deviations: number[] = [];
  for (let y = 0; y < height - TEXTURE_WINDOW; y += TEXTURE_WINDOW) {
    for (let x = 0; x < width - TEXTURE_WINDOW; x += TEXTURE_WINDOW) {
      const window: number[] = [];
      for (let wy = y; wy < Math.min(y + TEXTURE_WINDOW, height); wy++) {
        for (let wx = x; wx < Math.min(x + TEXTURE_WINDOW, width); wx++) {
          window.push(values[wy * width + wx]);
        }
      }
      deviations.push(standardDeviation(window) / 128);
    }
  }
  return deviations.length > 0 ? mean(deviations) * 2 : 0;
}

/** Fraction of stride-sampled pixels whose colour moved by more than the motion threshold. */
export function motionRatio(previous: FrameImage, current: FrameImage): number {
  let moving = 0;
  let samples = 0;
  for (let y = 0; y < current.height; y += SAMPLE_STRIDE) {
    for (let x = 0; x < current.width; x += SAMPLE_STRIDE) {
      if (colorDifference(current, x, y, previous, x, y) > MOTION_THRESHOLD) {
        moving++;
      }
      samples++;
    }
  }
  return samples > 0 ? moving / samples : 0;
}

/**
 * Share of sampled pixels far from the modal gray value, scaled by 3.
 * Ties for the mode go to the lowest gray value.
 */
export function foregroundRatio(gray: GrayPlane): number {
  const { width, height, values } = gray;
  const histogram = new Array<number>(256).fill(0);
  for (let y = 0; y < height; y += SAMPLE_STRIDE) {
    for (let x = 0; x < width; x += SAMPLE_STRIDE) {
      histogram[values[y * width + x]]++;
    }
  }

  let background = 0;
  for (let g = 1; g < histogram.length; g++) {
    if (histogram[g] > histogram[background]) {
      background = g;
    }
  }

  let foreground = 0;
  let samples = 0;
  for (let y = 0; y < height; y += SAMPLE_STRIDE) {
    for (let x = 0; x < width; x += SAMPLE_STRIDE) {
      if (Math.abs(values[y * width + x] - background) > FOREGROUND_THRESHOLD) {
        foreground++;
      }
      samples++;
    }
  }
  return samples > 0 ? (foreground / samples) * 3 : 0;
}

export function emptyDensityMap(): number[][] {
  return Array.from({ length: GRID_SIZE }, () => new Array<number>(GRID_SIZE).fill(0));
}

/**
 * Dark-pixel fraction per grid cell. Cells are `floor(w / GRID_SIZE)` by
 * `floor(h / GRID_SIZE)` pixels; trailing pixels past the last cell are ignored.
 */
export function densityMap(gray: GrayPlane): number[][] {
  const map = emptyDensityMap();
  const cellWidth = Math.floor(gray.width / GRID_SIZE);
  const cellHeight = Math.floor(gray.height / GRID_SIZE);
  if (cellWidth === 0 || cellHeight === 0) {
    return map;
  }

  for (let gy = 0; gy < GRID_SIZE; gy++) {
    for (let gx = 0; gx < GRID_SIZE; gx++) {
      let dark = 0;
      for (let y = gy * cellHeight; y < (gy + 1) * cellHeight; y++) {
        for (let x = gx * cellWidth; x < (gx + 1) * cellWidth; x++) {
          if (gray.values[y * gray.width + x] < DARK_PIXEL_THRESHOLD) {
            dark++;
          }
        }
      }
      map[gy][gx] = dark / (cellWidth * cellHeight);
    }
  }
  return map;
}

export function combineSignals(signals: DensitySignals): number {
  return (
    signals.edge * SIGNAL_WEIGHTS.edge +
    signals.texture * SIGNAL_WEIGHTS.texture +
    signals.motion * SIGNAL_WEIGHTS.motion +
    signals.foreground * SIGNAL_WEIGHTS.foreground
  );
}

function pixelsPerPerson(density: number): number {
  if (density < 0.3) {
    return PIXELS_PER_PERSON_SPARSE;
  }
  if (density < 0.6) {
    return PIXELS_PER_PERSON_DENSE;
  }
  return PIXELS_PER_PERSON_PACKED;
}

function correctionFactor(density: number): number {
  if (density < 0.2) {
    return 1.2;
  }
  if (density < 0.5) {
    return 1.0;
  }
  if (density < 0.7) {
    return 0.9;
  }
  return 0.85;
}

/** People estimate for a combined density over `area` pixels; never below 1. */
export function estimateCount(density: number, area: number): number {
  const base = Math.floor((area * density) / pixelsPerPerson(density));
  const corrected = Math.floor(base * correctionFactor(density));
  return Math.max(1, corrected);
}

/** One minus the coefficient of variation of the signals, clamped to [0.3, 0.9]. */
export function signalConfidence(values: readonly number[]): number {
  const average = mean(values);
  if (average <= 0) {
    return 0.3;
  }
  const confidence = 1 - Math.min(standardDeviation(values) / average, 1);
  return Math.max(0.3, Math.min(0.9, confidence));
}

function standardDeviation(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const average = mean(values);
  return Math.sqrt(mean(values.map((v) => (v - average) * (v - average))));
}
