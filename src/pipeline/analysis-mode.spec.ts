import { AnalysisMode, AnalysisModeMachine } from './analysis-mode';

describe('AnalysisModeMachine', () => {
  it('starts in tracking and reports transitions only', () => {
    const machine = new AnalysisModeMachine();

    expect(machine.mode).toBe(AnalysisMode.Tracking);
    expect(machine.apply({ crowd: false, quickDensity: 0 })).toBe(false);
    expect(machine.apply({ crowd: true, quickDensity: 0.8 })).toBe(true);
    expect(machine.mode).toBe(AnalysisMode.Crowd);
    expect(machine.apply({ crowd: true, quickDensity: 0.9 })).toBe(false);
    expect(machine.apply({ crowd: false, quickDensity: 0.1 })).toBe(true);
    expect(machine.mode).toBe(AnalysisMode.Tracking);
  });

  it('returns to tracking on reset', () => {
    const machine = new AnalysisModeMachine();
    machine.apply({ crowd: true, quickDensity: 0 });
    machine.reset();

    expect(machine.mode).toBe(AnalysisMode.Tracking);
  });
});
