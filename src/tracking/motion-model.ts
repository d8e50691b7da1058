import { Box, boxCenter, boxFromCenter, boxHeight, boxWidth } from '../../libs/common/src/geometry';

/**
 * Constant-velocity predictor with an exponentially blended velocity.
 *
 * This is not a Kalman filter: there is no covariance. `correct` snaps the
 * position and size to the measurement and blends velocity half-and-half with
 * the observed displacement, so the model follows measurements immediately.
 */
export class MotionModel {
  private cx = 0;
  private cy = 0;
  private width = 0;
  private height = 0;
  private vx = 0;
  private vy = 0;

  static fromBox(box: Box): MotionModel {
    const model = new MotionModel();
    model.initiate(box);
    return model;
  }

  initiate(box: Box): void {
    const center = boxCenter(box);
    this.cx = center.x;
    this.cy = center.y;
    this.width = boxWidth(box);
    this.height = boxHeight(box);
    this.vx = 0;
    this.vy = 0;
  }

  predict(): Box {
    this.cx += this.vx;
    this.cy += this.vy;
    return this.box();
  }

  correct(measurement: Box): void {
    const measured = boxCenter(measurement);

    this.vx = 0.5 * this.vx + 0.5 * (measured.x - this.cx);
    this.vy = 0.5 * this.vy + 0.5 * (measured.y - this.cy);

    this.cx = measured.x;
    this.cy = measured.y;
    this.width = boxWidth(measurement);
    this.height = boxHeight(measurement);
  }

  box(): Box {
    return boxFromCenter(this.cx, this.cy, this.width, this.height);
  }

  velocity(): { vx: number; vy: number } {
    return { vx: this.vx, vy: this.vy };
  }
}
