import type { Box } from '../../libs/common/src/geometry';

export const UNASSIGNED_TRACK_ID = -1;

/**
 * A person detection for one frame. `trackId` stays {@link UNASSIGNED_TRACK_ID}
 * until the tracker annotates it.
 */
export interface Detection {
  box: Box;
  confidence: number;
  classId: number;
  trackId: number;
}

export enum TrackState {
  New = 'new',
  Tracked = 'tracked',
  Lost = 'lost',
  Removed = 'removed',
}

export interface TrackerParams {
  /** Detections at or above this confidence are the high tier. */
  trackThresh: number;
  /** Pairs are only considered when `1 - IoU` is below this. */
  matchThresh: number;
  /** Frames a track may go unmatched before it is removed. */
  trackBuffer: number;
}

export const DEFAULT_TRACKER_PARAMS: Readonly<TrackerParams> = Object.freeze({
  trackThresh: 0.5,
  matchThresh: 0.8,
  trackBuffer: 30,
});

export interface TrackView {
  readonly id: number;
  readonly box: Box;
  readonly confidence: number;
  readonly classId: number;
  readonly age: number;
  readonly timeSinceUpdate: number;
  readonly state: TrackState;
  readonly history: readonly Box[];
}
