import { MotionModel } from './motion-model';

describe('MotionModel', () => {
  it('predicts in place until a velocity has been observed', () => {
    const model = MotionModel.fromBox({ left: 0, top: 0, right: 10, bottom: 20 });

    expect(model.predict()).toEqual({ left: 0, top: 0, right: 10, bottom: 20 });
    expect(model.velocity()).toEqual({ vx: 0, vy: 0 });
  });

  it('blends velocity half-and-half with the observed displacement', () => {
    const model = MotionModel.fromBox({ left: 0, top: 0, right: 10, bottom: 10 });
    model.predict();

    model.correct({ left: 4, top: 0, right: 14, bottom: 10 });
    expect(model.velocity()).toEqual({ vx: 2, vy: 0 });

    expect(model.predict()).toEqual({ left: 6, top: 0, right: 16, bottom: 10 });

    // measured center 13, prior center 11: 0.5 * 2 + 0.5 * 2
    model.correct({ left: 8, top: 0, right: 18, bottom: 10 });
    expect(model.velocity()).toEqual({ vx: 2, vy: 0 });
  });

  it('snaps position and size to the measurement without smoothing', () => {
    const model = MotionModel.fromBox({ left: 0, top: 0, right: 10, bottom: 10 });
    model.predict();

    model.correct({ left: 100, top: 50, right: 140, bottom: 130 });

    expect(model.box()).toEqual({ left: 100, top: 50, right: 140, bottom: 130 });
    expect(model.velocity()).toEqual({ vx: 57.5, vy: 42.5 });
  });
});
