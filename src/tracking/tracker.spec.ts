import { Tracker } from './tracker';
import { Detection, TrackState, UNASSIGNED_TRACK_ID } from './tracking.types';

function detection(left: number, top: number, confidence = 0.9, width = 100, height = 200): Detection {
  return {
    box: { left, top, right: left + width, bottom: top + height },
    confidence,
    classId: 0,
    trackId: UNASSIGNED_TRACK_ID,
  };
}

describe('Tracker', () => {
  it('creates sequential tracks and re-matches shifted boxes without new ids', () => {
    const tracker = new Tracker();
    const frame1 = [0, 200, 400, 600, 800].map((x) => detection(x, 100));

    const first = tracker.update(frame1);
    expect(first.map((d) => d.trackId)).toEqual([1, 2, 3, 4, 5]);
    expect(tracker.liveTracks().map((t) => t.age)).toEqual([0, 0, 0, 0, 0]);
    expect(tracker.liveTracks().every((t) => t.state === TrackState.New)).toBe(true);

    const frame2 = [0, 200, 400, 600, 800].map((x) => detection(x + 2, 102));
    const second = tracker.update(frame2);

    expect(second.map((d) => d.trackId)).toEqual([1, 2, 3, 4, 5]);
    expect(second[0].box).toEqual({ left: 2, top: 102, right: 102, bottom: 302 });
    expect(tracker.liveTracks().map((t) => t.age)).toEqual([1, 1, 1, 1, 1]);
    expect(tracker.liveTracks().every((t) => t.state === TrackState.Tracked)).toBe(true);
  });

  it('keeps a track for trackBuffer missed frames and removes it on the next', () => {
    const tracker = new Tracker({ trackBuffer: 30 });
    tracker.update([detection(0, 0)]);

    for (let i = 0; i < 30; i++) {
      tracker.update([]);
    }
    const [lost] = tracker.liveTracks();
    expect(lost.timeSinceUpdate).toBe(30);
    expect(lost.state).toBe(TrackState.Lost);

    expect(tracker.update([])).toEqual([]);
  });

  it('never reuses an id after removal', () => {
    const tracker = new Tracker({ trackBuffer: 1 });
    tracker.update([detection(0, 0)]);
    tracker.update([]);
    tracker.update([]);
    expect(tracker.liveTracks()).toEqual([]);

    const [revived] = tracker.update([detection(0, 0)]);
    expect(revived.trackId).toBe(2);
  });

  it('keeps counting ids across reset', () => {
    const tracker = new Tracker();
    tracker.update([detection(0, 0), detection(500, 0)]);
    tracker.reset();

    expect(tracker.update([detection(0, 0)]).map((d) => d.trackId)).toEqual([3]);
  });

  it('recovers a track from a low-confidence detection', () => {
    const tracker = new Tracker();
    tracker.update([detection(0, 0, 0.9)]);

    const result = tracker.update([detection(1, 1, 0.3)]);

    expect(result).toHaveLength(1);
    expect(result[0].trackId).toBe(1);
    expect(result[0].confidence).toBe(0.3);
    expect(tracker.liveTracks()[0].timeSinceUpdate).toBe(0);
  });

  it('does not start tracks from low-confidence detections', () => {
    const tracker = new Tracker();

    expect(tracker.update([detection(0, 0, 0.49)])).toEqual([]);
    expect(tracker.update([detection(0, 0, 0.5)]).map((d) => d.trackId)).toEqual([1]);
  });

  it('surfaces lost tracks at their predicted position', () => {
    const tracker = new Tracker();
    tracker.update([detection(0, 0)]);
    tracker.update([detection(10, 0)]);

    // velocity after one correction is 0.5 * 10 = 5 px per frame
    const [coasting] = tracker.update([]);

    expect(coasting.trackId).toBe(1);
    expect(coasting.box).toEqual({ left: 15, top: 0, right: 115, bottom: 200 });
  });

  it('bounds per-track history at 30 boxes', () => {
    const tracker = new Tracker();
    for (let i = 0; i < 40; i++) {
      tracker.update([detection(i, 0)]);
    }

    const [track] = tracker.liveTracks();
    expect(track.history).toHaveLength(30);
    expect(track.history[29].left).toBe(39);
  });

  it('treats an empty frame as aging every track', () => {
    const tracker = new Tracker();
    tracker.update([detection(0, 0), detection(400, 0)]);
    tracker.update([]);

    expect(tracker.liveTracks().map((t) => t.timeSinceUpdate)).toEqual([1, 1]);
  });

  it('applies new thresholds without dropping tracks', () => {
    const tracker = new Tracker();
    tracker.update([detection(0, 0, 0.6)]);
    tracker.setParams({ trackThresh: 0.7 });

    const result = tracker.update([detection(0, 0, 0.6), detection(500, 0, 0.6)]);

    expect(result.map((d) => d.trackId)).toEqual([1]);
    expect(tracker.getParams().trackThresh).toBe(0.7);
  });
});
