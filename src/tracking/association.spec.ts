import { associateGreedy } from './association';

const box = (left: number, top: number, right: number, bottom: number) => ({ box: { left, top, right, bottom } });

describe('associateGreedy', () => {
  it('pairs a lone track and detection whose IoU clears the threshold', () => {
    const track = box(0, 0, 10, 10);
    const detection = box(0, 0, 10, 5); // IoU 0.5, cost 0.5

    const result = associateGreedy([track], [detection], 0.8);

    expect(result.matches).toEqual([[track, detection]]);
    expect(result.unmatchedTracks).toEqual([]);
    expect(result.unmatchedDetections).toEqual([]);
  });

  it('rejects pairs whose cost is not strictly below the threshold', () => {
    const track = box(0, 0, 10, 10);
    const detection = box(0, 0, 10, 2); // IoU 0.2, cost 0.8

    const result = associateGreedy([track], [detection], 0.8);

    expect(result.matches).toEqual([]);
    expect(result.unmatchedTracks).toEqual([track]);
    expect(result.unmatchedDetections).toEqual([detection]);
  });

  it('gives a contested detection to the cheapest pair', () => {
    const far = box(0, 0, 10, 10);
    const near = box(4, 0, 14, 10);
    const detection = box(5, 0, 15, 10);

    const result = associateGreedy([far, near], [detection], 0.8);

    expect(result.matches).toEqual([[near, detection]]);
    expect(result.unmatchedTracks).toEqual([far]);
  });

  it('breaks equal costs by track order', () => {
    const first = box(0, 0, 10, 10);
    const second = box(0, 0, 10, 10);
    const detection = box(0, 0, 10, 10);

    const result = associateGreedy([first, second], [detection], 0.8);

    expect(result.matches[0][0]).toBe(first);
    expect(result.unmatchedTracks[0]).toBe(second);
  });

  it('is greedy rather than optimal', () => {
    // t1 prefers d1 strongly; t2 can only use d1. Greedy leaves t2 unmatched.
    const t1 = box(0, 0, 10, 10);
    const t2 = box(3, 0, 13, 10);
    const d1 = box(1, 0, 11, 10);
    const d2 = box(-6, 0, 4, 10);

    const result = associateGreedy([t1, t2], [d1, d2], 0.8);

    expect(result.matches).toEqual([[t1, d1]]);
    expect(result.unmatchedTracks).toEqual([t2]);
    expect(result.unmatchedDetections).toEqual([d2]);
  });

  it('returns everything unmatched when either side is empty', () => {
    const detection = box(0, 0, 1, 1);
    expect(associateGreedy([], [detection], 0.8)).toEqual({
      matches: [],
      unmatchedTracks: [],
      unmatchedDetections: [detection],
    });
  });
});
