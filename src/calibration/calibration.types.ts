import type { CountingLine, Zone } from '../analysis/analysis.types';

export interface PipelineThresholds {
  trackThresh: number;
  matchThresh: number;
  trackBuffer: number;
  crowdModeThreshold: number;
  highDensityThreshold: number;
}

/**
 * Immutable calibration as of one point in time. Every change produces a new
 * object; a changed `countingLine` reference means the line moved.
 */
export interface CalibrationState {
  readonly zones: readonly Readonly<Zone>[];
  readonly countingLine: Readonly<CountingLine>;
  readonly thresholds: Readonly<PipelineThresholds>;
}
