import { colorDifference, grayAt, isValidFrameImage, toGrayscale } from './frame-image';
import { makeImage } from './frame-image.fixtures';

describe('frame image helpers', () => {
  it('computes integer luma', () => {
    const image = makeImage(2, 1, (x) => (x === 0 ? [255, 0, 0] : [10, 20, 30]));

    // 299 * 255 / 1000 = 76.245; (2990 + 11740 + 3420) / 1000 = 18.15
    expect(grayAt(image, 0, 0)).toBe(76);
    expect(Array.from(toGrayscale(image))).toEqual([76, 18]);
  });

  it('sums absolute channel differences', () => {
    const image = makeImage(2, 1, (x) => (x === 0 ? [10, 200, 30] : [40, 180, 30]));
    expect(colorDifference(image, 0, 0, image, 1, 0)).toBe(50);
  });

  it('rejects a buffer shorter than the declared size', () => {
    expect(isValidFrameImage({ width: 2, height: 2, data: new Uint8Array(12) })).toBe(false);
    expect(isValidFrameImage({ width: 2, height: 2, data: new Uint8Array(16) })).toBe(true);
    expect(isValidFrameImage({ width: 0, height: 2, data: new Uint8Array(16) })).toBe(false);
  });
});
