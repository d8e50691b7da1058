import { Box } from '../../libs/common/src/geometry';
import { RingBuffer } from '../../libs/common/src/collections';
import { MotionModel } from './motion-model';
import { Detection, TrackState, TrackView } from './tracking.types';

export const TRACK_HISTORY_CAPACITY = 30;

/**
 * One tracked identity. Mutated only by the {@link Tracker} that created it.
 */
export class Track {
  box: Box;
  confidence: number;
  classId: number;
  age = 0;
  timeSinceUpdate = 0;
  state: TrackState = TrackState.New;
  readonly history = new RingBuffer<Box>(TRACK_HISTORY_CAPACITY);
  private readonly motion: MotionModel;

  constructor(readonly id: number, detection: Detection) {
    this.box = detection.box;
    this.confidence = detection.confidence;
    this.classId = detection.classId;
    this.motion = MotionModel.fromBox(detection.box);
    this.history.push(detection.box);
  }

  predict(): void {
    this.box = this.motion.predict();
    this.timeSinceUpdate++;
    this.state = TrackState.Lost;
  }

  update(detection: Detection): void {
    this.motion.correct(detection.box);
    this.box = detection.box;
    this.confidence = detection.confidence;
    this.classId = detection.classId;
    this.timeSinceUpdate = 0;
    this.age++;
    this.state = TrackState.Tracked;
    this.history.push(detection.box);
  }

  markRemoved(): void {
    this.state = TrackState.Removed;
  }

  toDetection(): Detection {
    return { box: this.box, confidence: this.confidence, classId: this.classId, trackId: this.id };
  }

  toView(): TrackView {
    return {
      id: this.id,
      box: this.box,
      confidence: this.confidence,
      classId: this.classId,
      age: this.age,
      timeSinceUpdate: this.timeSinceUpdate,
      state: this.state,
      history: this.history.toArray(),
    };
  }
}
