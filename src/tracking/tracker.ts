import { Logger } from '@nestjs/common';
import { associateGreedy } from './association';
import { Track } from './track';
import { DEFAULT_TRACKER_PARAMS, Detection, TrackerParams, TrackView } from './tracking.types';

/**
 * Two-tier IoU tracker: high-confidence detections are matched first, then
 * leftover tracks get a second chance against low-confidence detections.
 * Only high-confidence detections can start a track. Lost tracks are never
 * re-identified once removed.
 *
 * `update` must be called once per frame from a single caller.
 */
export class Tracker {
  private readonly logger = new Logger(Tracker.name);
  private readonly tracks = new Map<number, Track>();
  private nextTrackId = 1;
  private params: TrackerParams;

  constructor(params: Partial<TrackerParams> = {}) {
    this.params = { ...DEFAULT_TRACKER_PARAMS, ...params };
  }

  getParams(): Readonly<TrackerParams> {
    return this.params;
  }

  /** Takes effect on the next frame; live tracks are kept. */
  setParams(params: Partial<TrackerParams>): void {
    this.params = { ...this.params, ...params };
  }

  update(detections: readonly Detection[]): Detection[] {
    const { trackThresh, matchThresh, trackBuffer } = this.params;

    for (const track of this.tracks.values()) {
      track.predict();
    }

    const highConfidence = detections.filter((d) => d.confidence >= trackThresh);
    const lowConfidence = detections.filter((d) => d.confidence < trackThresh);

    const first = associateGreedy(Array.from(this.tracks.values()), highConfidence, matchThresh);
    for (const [track, detection] of first.matches) {
      track.update(detection);
    }

    const second = associateGreedy(first.unmatchedTracks, lowConfidence, matchThresh);
    for (const [track, detection] of second.matches) {
      track.update(detection);
    }

    for (const detection of first.unmatchedDetections) {
      const track = new Track(this.nextTrackId++, detection);
      this.tracks.set(track.id, track);
    }

    for (const track of second.unmatchedTracks) {
      if (track.timeSinceUpdate > trackBuffer) {
        track.markRemoved();
        this.tracks.delete(track.id);
        this.logger.debug(`Track ${track.id} removed after ${track.timeSinceUpdate} frames`);
      }
    }

    return Array.from(this.tracks.values(), (track) => track.toDetection());
  }

  liveTracks(): TrackView[] {
    return Array.from(this.tracks.values(), (track) => track.toView());
  }

  /** Drops every track. The id sequence keeps counting so ids are never reused. */
  reset(): void {
    this.tracks.clear();
  }
}
