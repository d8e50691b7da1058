import type { FrameImage } from '../analysis/frame-image';

/** Detector output for one person, before normalisation. */
export interface RawDetection {
  left: number;
  top: number;
  right: number;
  bottom: number;
  confidence: number;
  classId: number;
}

/**
 * One frame handed to the pipeline. `detections` is whatever the upstream
 * detector produced; it is validated by the {@link PersonDetector}.
 */
export interface FrameInput {
  cameraId?: string;
  width: number;
  height: number;
  detections: unknown;
  image?: FrameImage;
}

export type FrameOutcome = 'processed' | 'dropped' | 'failed';

export type ResetOutcome = 'applied' | 'deferred';
