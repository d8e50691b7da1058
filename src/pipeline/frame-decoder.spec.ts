import { decodeFrameMessage, decodePixels } from './frame-decoder';

describe('decodeFrameMessage', () => {
  it('treats an unreadable message as an empty frame', () => {
    expect(decodeFrameMessage(null)).toEqual({ width: 0, height: 0, detections: [] });
  });

  it('maps the wire fields and decodes pixels', () => {
    const pixels = Buffer.from([1, 2, 3, 255, 4, 5, 6, 255]).toString('base64');

    const frame = decodeFrameMessage({
      camera_id: 'cam-1',
      width: 2,
      height: 1,
      detections: [{ left: 0, top: 0, right: 1, bottom: 1, confidence: 0.8 }],
      pixels,
    });

    expect(frame.cameraId).toBe('cam-1');
    expect(frame.width).toBe(2);
    expect(frame.detections).toEqual([{ left: 0, top: 0, right: 1, bottom: 1, confidence: 0.8 }]);
    expect(Array.from(frame.image?.data ?? [])).toEqual([1, 2, 3, 255, 4, 5, 6, 255]);
  });

  it('ignores non-integer dimensions', () => {
    const frame = decodeFrameMessage({ width: 1.5, height: -2, detections: [] });
    expect([frame.width, frame.height]).toEqual([0, 0]);
  });
});

describe('decodePixels', () => {
  it('discards a buffer too short for the frame', () => {
    const pixels = Buffer.from([1, 2, 3, 255]).toString('base64');
    expect(decodePixels(pixels, 2, 2)).toBeUndefined();
  });

  it('returns nothing without pixels', () => {
    expect(decodePixels(undefined, 2, 2)).toBeUndefined();
  });
});
