import { Logger } from '@nestjs/common';
import { mean, RingBuffer } from '../../libs/common/src/collections';
import { CrowdAnalysis } from './analysis.types';
import { densityBandFor } from './density-band';
import {
  combineSignals,
  densityMap,
  DensitySignals,
  edgeDensity,
  emptyDensityMap,
  estimateCount,
  foregroundRatio,
  GrayPlane,
  motionRatio,
  quickDensity,
  signalConfidence,
  textureDensity,
} from './density-signals';
import { FrameImage, toGrayscale } from './frame-image';

export interface CrowdThresholds {
  /** Crowd mode when the detector count is strictly above this. */
  crowdModeThreshold: number;
  /** Crowd mode when the quick density is strictly above this. */
  highDensityThreshold: number;
}

export const DEFAULT_CROWD_THRESHOLDS: Readonly<CrowdThresholds> = Object.freeze({
  crowdModeThreshold: 20,
  highDensityThreshold: 0.7,
});

export interface ModeDecision {
  crowd: boolean;
  quickDensity: number;
}

const PASSTHROUGH_CONFIDENCE = 0.9;
const FIRST_FRAME_MOTION = 0.5;
const MOTION_HISTORY = 10;

/**
 * Density-based people estimate for frames too crowded to track.
 *
 * Keeps the previous frame and a short motion history between calls, so a
 * single instance must only see frames from one camera, in order.
 */
export class CrowdDensityEstimator {
  private readonly logger = new Logger(CrowdDensityEstimator.name);
  private thresholds: CrowdThresholds;
  private previousFrame: FrameImage | null = null;
  private readonly motionHistory = new RingBuffer<number>(MOTION_HISTORY);

  constructor(thresholds: Partial<CrowdThresholds> = {}) {
    this.thresholds = { ...DEFAULT_CROWD_THRESHOLDS, ...thresholds };
  }

  getThresholds(): Readonly<CrowdThresholds> {
    return this.thresholds;
  }

  setThresholds(thresholds: Partial<CrowdThresholds>): void {
    this.thresholds = { ...this.thresholds, ...thresholds };
  }

  decideMode(image: FrameImage | undefined, detectorCount: number): ModeDecision {
    const quick = image ? quickDensity(image) : 0;
    return {
      crowd: detectorCount > this.thresholds.crowdModeThreshold || quick > this.thresholds.highDensityThreshold,
      quickDensity: quick,
    };
  }

  analyze(image: FrameImage | undefined, detectorCount: number): CrowdAnalysis {
    const decision = this.decideMode(image, detectorCount);
    return decision.crowd ? this.analyzeCrowd(image, detectorCount) : this.passthrough(detectorCount);
  }

  /** Tracking-mode result: the detector count as is. */
  passthrough(detectorCount: number): CrowdAnalysis {
    return {
      estimatedCount: detectorCount,
      band: densityBandFor(detectorCount),
      densityMap: emptyDensityMap(),
      confidence: PASSTHROUGH_CONFIDENCE,
      inCrowdMode: false,
    };
  }

  /**
   * Crowd-mode estimate. Without pixels the detector count is all there is,
   * reported at minimum confidence.
   */
  analyzeCrowd(image: FrameImage | undefined, detectorCount: number): CrowdAnalysis {
    if (!image) {
      return {
        estimatedCount: detectorCount,
        band: densityBandFor(detectorCount),
        densityMap: emptyDensityMap(),
        confidence: 0.3,
        inCrowdMode: true,
      };
    }

    const gray: GrayPlane = { width: image.width, height: image.height, values: toGrayscale(image) };
    const signals: DensitySignals = {
      edge: edgeDensity(gray),
      texture: textureDensity(gray),
      motion: this.motionDensity(image),
      foreground: foregroundRatio(gray),
    };
    const density = combineSignals(signals);
    const estimate = estimateCount(density, image.width * image.height);
    const finalCount = Math.max(estimate, detectorCount);

    this.logger.debug(
      `Crowd signals edge=${signals.edge.toFixed(3)} texture=${signals.texture.toFixed(3)} ` +
        `motion=${signals.motion.toFixed(3)} foreground=${signals.foreground.toFixed(3)} -> ${finalCount}`,
    );

    return {
      estimatedCount: finalCount,
      band: densityBandFor(finalCount),
      densityMap: densityMap(gray),
      confidence: signalConfidence([signals.edge, signals.texture, signals.motion, signals.foreground]),
      inCrowdMode: true,
    };
  }

  reset(): void {
    this.previousFrame = null;
    this.motionHistory.clear();
  }

  private motionDensity(image: FrameImage): number {
    const previous = this.previousFrame;
    this.previousFrame = image;
    if (!previous || previous.width !== image.width || previous.height !== image.height) {
      return FIRST_FRAME_MOTION;
    }
    this.motionHistory.push(motionRatio(previous, image));
    return mean(this.motionHistory.toArray()) * 5;
  }
}
