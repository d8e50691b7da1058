import { UNASSIGNED_TRACK_ID, Detection } from '../tracking/tracking.types';
import { RawDetection } from './pipeline.types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function finiteNumber(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Reads detector output of unknown shape. Anything that is not an array
 * yields no detections; entries missing a coordinate or the confidence are skipped.
 */
export function parseRawDetections(value: unknown): RawDetection[] {
  if (!Array.isArray(value)) {
    return [];
  }

  const out: RawDetection[] = [];
  for (const item of value) {
    if (!isRecord(item)) {
      continue;
    }
    const left = finiteNumber(item, 'left');
    const top = finiteNumber(item, 'top');
    const right = finiteNumber(item, 'right');
    const bottom = finiteNumber(item, 'bottom');
    const confidence = finiteNumber(item, 'confidence');
    if (left === undefined || top === undefined || right === undefined || bottom === undefined || confidence === undefined) {
      continue;
    }
    const classId = finiteNumber(item, 'classId') ?? finiteNumber(item, 'class_id') ?? 0;
    out.push({ left, top, right, bottom, confidence, classId });
  }
  return out;
}

/** Drops boxes without area and clamps confidence to [0, 1]. */
export function toDetections(raw: readonly RawDetection[]): Detection[] {
  return raw
    .filter((d) => d.right > d.left && d.bottom > d.top)
    .map((d) => ({
      box: { left: d.left, top: d.top, right: d.right, bottom: d.bottom },
      confidence: Math.min(1, Math.max(0, d.confidence)),
      classId: d.classId,
      trackId: UNASSIGNED_TRACK_ID,
    }));
}
