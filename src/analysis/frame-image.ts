/**
 * Decoded frame pixels, RGBA row-major, 4 bytes per pixel.
 */
export interface FrameImage {
  width: number;
  height: number;
  data: Uint8Array | Uint8ClampedArray;
}

export function pixelOffset(image: FrameImage, x: number, y: number): number {
  return (y * image.width + x) * 4;
}

/** Luma with integer weights, truncated to 0..255. */
export function grayAt(image: FrameImage, x: number, y: number): number {
  const i = pixelOffset(image, x, y);
  const { data } = image;
  return Math.floor((299 * data[i] + 587 * data[i + 1] + 114 * data[i + 2]) / 1000);
}

/** Grayscale plane of the whole image. */
export function toGrayscale(image: FrameImage): Uint8Array {
  const gray = new Uint8Array(image.width * image.height);
  for (let y = 0; y < image.height; y++) {
    for (let x = 0; x < image.width; x++) {
      gray[y * image.width + x] = grayAt(image, x, y);
    }
  }
  return gray;
}

/** Sum of absolute RGB channel differences between two pixels, possibly of two images. */
export function colorDifference(
  a: FrameImage,
  ax: number,
  ay: number,
  b: FrameImage,
  bx: number,
  by: number,
): number {
  const i = pixelOffset(a, ax, ay);
  const j = pixelOffset(b, bx, by);
  return (
    Math.abs(a.data[i] - b.data[j]) +
    Math.abs(a.data[i + 1] - b.data[j + 1]) +
    Math.abs(a.data[i + 2] - b.data[j + 2])
  );
}

export function isValidFrameImage(image: FrameImage): boolean {
  return (
    Number.isInteger(image.width) &&
    Number.isInteger(image.height) &&
    image.width > 0 &&
    image.height > 0 &&
    image.data.length >= image.width * image.height * 4
  );
}
