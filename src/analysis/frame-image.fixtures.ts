import { FrameImage } from './frame-image';

export type Rgb = [number, number, number];

/** Builds an RGBA test frame from a per-pixel colour function. */
export function makeImage(width: number, height: number, colorAt: (x: number, y: number) => Rgb): FrameImage {
  const data = new Uint8Array(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const [r, g, b] = colorAt(x, y);
      const i = (y * width + x) * 4;
      data[i] = r;
      data[i + 1] = g;
      data[i + 2] = b;
      data[i + 3] = 255;
    }
  }
  return { width, height, data };
}

export function gray(value: number): Rgb {
  return [value, value, value];
}
