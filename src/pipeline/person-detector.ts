import { Injectable } from '@nestjs/common';
import { parseRawDetections } from './detection-parser';
import { FrameInput, RawDetection } from './pipeline.types';

export const PERSON_DETECTOR = 'PERSON_DETECTOR';

/**
 * Source of person boxes for a frame. A model-backed implementation can be
 * bound to {@link PERSON_DETECTOR} in place of the default.
 */
export interface PersonDetector {
  detect(frame: FrameInput): Promise<RawDetection[]>;
}

/** Uses the detections already computed upstream and carried in the frame. */
@Injectable()
export class PayloadDetector implements PersonDetector {
  async detect(frame: FrameInput): Promise<RawDetection[]> {
    return parseRawDetections(frame.detections);
  }
}
