import { Box, iou } from '../../libs/common/src/geometry';

export interface Association<T, D> {
  matches: Array<[T, D]>;
  unmatchedTracks: T[];
  unmatchedDetections: D[];
}

interface Candidate {
  trackIndex: number;
  detectionIndex: number;
  cost: number;
}

/**
 * Greedy IoU association.
 *
 * Every pair with `1 - IoU < matchThresh` is a candidate; candidates are taken in
 * ascending cost and accepted when neither side is already used. The sort is
 * stable, so equal costs resolve in track-major, detection-minor order. The
 * result is deterministic but not a globally optimal assignment.
 */
export function associateGreedy<T extends { box: Box }, D extends { box: Box }>(
  tracks: readonly T[],
  detections: readonly D[],
  matchThresh: number,
): Association<T, D> {
  if (tracks.length === 0 || detections.length === 0) {
    return { matches: [], unmatchedTracks: [...tracks], unmatchedDetections: [...detections] };
  }

  const candidates: Candidate[] = [];
  tracks.forEach((track, trackIndex) => {
    detections.forEach((detection, detectionIndex) => {
      const cost = 1 - iou(track.box, detection.box);
      if (cost < matchThresh) {
        candidates.push({ trackIndex, detectionIndex, cost });
      }
    });
  });
  candidates.sort((a, b) => a.cost - b.cost);

  const usedTracks = new Set<number>();
  const usedDetections = new Set<number>();
  const matches: Array<[T, D]> = [];

  for (const { trackIndex, detectionIndex } of candidates) {
    if (usedTracks.has(trackIndex) || usedDetections.has(detectionIndex)) {
      continue;
    }
    usedTracks.add(trackIndex);
    usedDetections.add(detectionIndex);
    matches.push([tracks[trackIndex], detections[detectionIndex]]);
  }

  return {
    matches,
    unmatchedTracks: tracks.filter((_, index) => !usedTracks.has(index)),
    unmatchedDetections: detections.filter((_, index) => !usedDetections.has(index)),
  };
}
