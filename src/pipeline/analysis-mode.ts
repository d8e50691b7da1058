import { Logger } from '@nestjs/common';
import type { ModeDecision } from '../analysis/crowd-density-estimator';

export enum AnalysisMode {
  Tracking = 'tracking',
  Crowd = 'crowd',
}

/**
 * Tracking while the scene is trackable, crowd estimation otherwise.
 * The switch predicate is the estimator's mode decision, evaluated every frame.
 */
export class AnalysisModeMachine {
  private readonly logger = new Logger(AnalysisModeMachine.name);
  private current: AnalysisMode = AnalysisMode.Tracking;

  get mode(): AnalysisMode {
    return this.current;
  }

  /** Returns true when the mode changed. */
  apply(decision: ModeDecision): boolean {
    const next = decision.crowd ? AnalysisMode.Crowd : AnalysisMode.Tracking;
    if (next === this.current) {
      return false;
    }
    this.logger.log(`Switching ${this.current} -> ${next} (quick density ${decision.quickDensity.toFixed(2)})`);
    this.current = next;
    return true;
  }

  reset(): void {
    this.current = AnalysisMode.Tracking;
  }
}
