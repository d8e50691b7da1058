import { Logger } from '@nestjs/common';
import { FrameImage, isValidFrameImage } from '../analysis/frame-image';
import { FrameInput } from './pipeline.types';

const logger = new Logger('FrameDecoder');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function nonNegativeInt(value: unknown): number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : 0;
}

function stringOrUndefined(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/** Decodes base64 RGBA pixels; a buffer that does not match the frame size is discarded. */
export function decodePixels(pixels: string | undefined, width: number, height: number): FrameImage | undefined {
  if (!pixels) {
    return undefined;
  }
  const image: FrameImage = { width, height, data: new Uint8Array(Buffer.from(pixels, 'base64')) };
  if (!isValidFrameImage(image)) {
    logger.warn(`Ignoring pixel buffer of ${image.data.length} bytes for a ${width}x${height} frame`);
    return undefined;
  }
  return image;
}

/**
 * Turns a detections-topic message into a frame. Anything unreadable becomes
 * a frame without detections.
 *
 * Expected shape: `{ camera_id?, timestamp?, width, height, detections, pixels? }`,
 * where `detections` holds `{ left, top, right, bottom, confidence, class_id? }`
 * boxes and `pixels` is base64 RGBA, row-major, `width × height × 4` bytes.
 */
export function decodeFrameMessage(payload: unknown): FrameInput {
  if (!isRecord(payload)) {
    return { width: 0, height: 0, detections: [] };
  }
  const width = nonNegativeInt(payload.width);
  const height = nonNegativeInt(payload.height);
  return {
    cameraId: stringOrUndefined(payload.camera_id),
    width,
    height,
    detections: payload.detections,
    image: decodePixels(stringOrUndefined(payload.pixels), width, height),
  };
}
