import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CountingLine, CrowdAnalysis } from '../analysis/analysis.types';
import { CrowdDensityEstimator, ModeDecision } from '../analysis/crowd-density-estimator';
import { LineCounter } from '../analysis/line-counter';
import { ZoneAggregator } from '../analysis/zone-aggregator';
import { CalibrationService } from '../calibration/calibration.service';
import { CalibrationState, PipelineThresholds } from '../calibration/calibration.types';
import { Tracker } from '../tracking/tracker';
import { Detection } from '../tracking/tracking.types';
import { AnalysisMode, AnalysisModeMachine } from './analysis-mode';
import { toDetections } from './detection-parser';
import { PERSON_DETECTOR, PersonDetector } from './person-detector';
import { FrameInput, FrameOutcome, ResetOutcome } from './pipeline.types';
import { AnalyticsSnapshot, buildSnapshot, Counters, ZERO_COUNTERS } from './snapshot';

export interface PipelineStatus {
  mode: AnalysisMode;
  busy: boolean;
  resetPending: boolean;
  processedFrames: number;
  droppedFrames: number;
  failedFrames: number;
  liveTracks: number;
}

interface FrameResult {
  decision: ModeDecision;
  currentCount: number;
  entries: number;
  exits: number;
  crowd: CrowdAnalysis;
}

/**
 * Runs detection, tracking, counting and crowd estimation for one frame at a time.
 *
 * A frame that arrives while another is in flight is dropped, not queued.
 * Counters and the analysis mode are replaced as a whole when a frame
 * completes, so readers of {@link getSnapshot} always see the state after some
 * complete frame. Tracker and line-counter state advance while the frame runs
 * and are not rolled back if it fails afterwards.
 */
@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);
  private readonly tracker: Tracker;
  private readonly lineCounter: LineCounter;
  private readonly zones = new ZoneAggregator();
  private readonly estimator: CrowdDensityEstimator;
  private readonly modeMachine = new AnalysisModeMachine();
  private readonly maxTrackableDetections: number;

  private busy = false;
  private resetPending = false;
  private counters: Counters = ZERO_COUNTERS;
  private snapshot: AnalyticsSnapshot;
  private snapshotCalibration: CalibrationState;
  /** No frame committed since start or the last reset. */
  private idle = true;
  private appliedLine: Readonly<CountingLine>;
  private appliedThresholds: Readonly<PipelineThresholds>;
  private processedFrames = 0;
  private droppedFrames = 0;
  private failedFrames = 0;

  constructor(
    @Inject(PERSON_DETECTOR) private readonly detector: PersonDetector,
    private readonly calibrationService: CalibrationService,
    private readonly configService: ConfigService,
  ) {
    const calibration = this.calibrationService.current();
    const { countingLine, thresholds } = calibration;
    this.snapshotCalibration = calibration;
    this.appliedLine = countingLine;
    this.appliedThresholds = thresholds;
    this.tracker = new Tracker({
      trackThresh: thresholds.trackThresh,
      matchThresh: thresholds.matchThresh,
      trackBuffer: thresholds.trackBuffer,
    });
    this.lineCounter = new LineCounter(countingLine);
    this.estimator = new CrowdDensityEstimator({
      crowdModeThreshold: thresholds.crowdModeThreshold,
      highDensityThreshold: thresholds.highDensityThreshold,
    });
    this.maxTrackableDetections = this.configService.get<number>('pipeline.maxTrackableDetections', 50);
    this.snapshot = this.snapshotOf(this.estimator.passthrough(0));
  }

  async submitFrame(frame: FrameInput): Promise<FrameOutcome> {
    if (this.busy) {
      this.droppedFrames++;
      this.logger.debug(`Frame dropped, pipeline busy (${this.droppedFrames} dropped so far)`);
      return 'dropped';
    }
    this.busy = true;

    const startedAt = performance.now();
    try {
      const result = await this.processFrame(frame);
      this.commit(result, performance.now() - startedAt);
      this.processedFrames++;
      return 'processed';
    } catch (error) {
      this.failedFrames++;
      this.logger.error(
        `Frame processing failed: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return 'failed';
    } finally {
      this.busy = false;
      if (this.resetPending) {
        this.resetPending = false;
        this.applyReset();
      }
    }
  }

  /** Clears all counting state. Deferred to the end of the current frame if one is in flight. */
  reset(): ResetOutcome {
    if (this.busy) {
      this.resetPending = true;
      this.logger.log('Reset requested mid-frame, deferring');
      return 'deferred';
    }
    this.applyReset();
    return 'applied';
  }

  /**
   * Before the first frame, the snapshot follows calibration changes (the
   * calibration file loads after construction); afterwards it changes per frame.
   */
  getSnapshot(): AnalyticsSnapshot {
    if (this.idle && this.calibrationService.current() !== this.snapshotCalibration) {
      this.snapshot = this.snapshotOf(this.estimator.passthrough(0));
    }
    return this.snapshot;
  }

  getStatus(): PipelineStatus {
    return {
      mode: this.modeMachine.mode,
      busy: this.busy,
      resetPending: this.resetPending,
      processedFrames: this.processedFrames,
      droppedFrames: this.droppedFrames,
      failedFrames: this.failedFrames,
      liveTracks: this.tracker.liveTracks().length,
    };
  }

  private async processFrame(frame: FrameInput): Promise<FrameResult> {
    const raw = await this.detector.detect(frame);
    const detections = toDetections(Array.isArray(raw) ? raw : []);
    const calibration = this.syncCalibration();

    const decision = this.estimator.decideMode(frame.image, detections.length);

    if (decision.crowd) {
      return this.processCrowdFrame(frame, detections, calibration, decision);
    }

    const tracked = this.tracker.update(detections);
    const { entries, exits } = this.countCrossings(tracked);
    this.zones.updateFromTracks(calibration.zones, tracked);

    return {
      decision,
      currentCount: tracked.length,
      entries,
      exits,
      crowd: this.estimator.passthrough(detections.length),
    };
  }

  /**
   * Density estimate first; the tracker and line counter still run while the
   * raw count is small enough to track.
   */
  private processCrowdFrame(
    frame: FrameInput,
    detections: Detection[],
    calibration: CalibrationState,
    decision: ModeDecision,
  ): FrameResult {
    const crowd = this.estimator.analyzeCrowd(frame.image, detections.length);

    let tracked: Detection[] | null = null;
    let entries = 0;
    let exits = 0;
    if (detections.length < this.maxTrackableDetections) {
      tracked = this.tracker.update(detections);
      ({ entries, exits } = this.countCrossings(tracked));
    }

    if (frame.image) {
      this.zones.updateFromDensityMap(calibration.zones, crowd.densityMap, frame.image.width, frame.image.height);
    } else if (tracked) {
      this.zones.updateFromTracks(calibration.zones, tracked);
    }

    return { decision, currentCount: crowd.estimatedCount, entries, exits, crowd };
  }

  private countCrossings(tracked: readonly Detection[]): { entries: number; exits: number } {
    let entries = 0;
    let exits = 0;
    for (const detection of tracked) {
      const crossing = this.lineCounter.checkCrossing(detection.trackId, detection.box);
      if (crossing === 'entry') {
        entries++;
        this.logger.debug(`Entry detected: track ${detection.trackId}`);
      } else if (crossing === 'exit') {
        exits++;
        this.logger.debug(`Exit detected: track ${detection.trackId}`);
      }
    }
    this.lineCounter.retain(tracked.map((d) => d.trackId));
    return { entries, exits };
  }

  /** Pushes calibration changes made since the last frame into the components. */
  private syncCalibration(): CalibrationState {
    const state = this.calibrationService.current();

    if (state.countingLine !== this.appliedLine) {
      this.lineCounter.setLine(state.countingLine);
      this.appliedLine = state.countingLine;
      this.logger.log('Counting line changed, crossing history cleared');
    }

    if (state.thresholds !== this.appliedThresholds) {
      const { trackThresh, matchThresh, trackBuffer, crowdModeThreshold, highDensityThreshold } = state.thresholds;
      this.tracker.setParams({ trackThresh, matchThresh, trackBuffer });
      this.estimator.setThresholds({ crowdModeThreshold, highDensityThreshold });
      this.appliedThresholds = state.thresholds;
    }

    return state;
  }

  private commit(result: FrameResult, latencyMs: number): void {
    this.modeMachine.apply(result.decision);
    this.counters = Object.freeze({
      currentCount: result.currentCount,
      totalEntries: this.counters.totalEntries + result.entries,
      totalExits: this.counters.totalExits + result.exits,
      uniqueVisitors: this.counters.uniqueVisitors + result.entries,
      fps: latencyMs > 0 ? 1000 / latencyMs : 0,
    });
    this.snapshot = this.snapshotOf(result.crowd);
    this.idle = false;
  }

  private applyReset(): void {
    this.tracker.reset();
    this.lineCounter.reset();
    this.zones.reset();
    this.estimator.reset();
    this.modeMachine.reset();
    this.counters = ZERO_COUNTERS;
    this.snapshot = this.snapshotOf(this.estimator.passthrough(0));
    this.idle = true;
    this.logger.log('Pipeline state reset');
  }

  private snapshotOf(crowd: CrowdAnalysis): AnalyticsSnapshot {
    this.snapshotCalibration = this.calibrationService.current();
    return buildSnapshot({
      timestamp: new Date(),
      mode: this.modeMachine.mode,
      counters: this.counters,
      zones: this.snapshotCalibration.zones,
      occupancy: (zoneId) => this.zones.occupancy(zoneId),
      crowd,
    });
  }
}
