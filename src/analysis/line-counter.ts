import { Box, boxCenter, Point } from '../../libs/common/src/geometry';
import { RingBuffer } from '../../libs/common/src/collections';
import { CountingLine, CrossingResult, DEFAULT_COUNTING_LINE } from './analysis.types';

const CENTER_HISTORY = 10;

interface CrossingState {
  centers: RingBuffer<Point>;
  hasCrossed: boolean;
  direction: Exclude<CrossingResult, 'none'> | null;
}

export interface CrossingView {
  hasCrossed: boolean;
  direction: Exclude<CrossingResult, 'none'> | null;
  centers: Point[];
}

/**
 * Counts each track at most once as it crosses the counting line. Moving
 * down the image (increasing y) is an exit, anything else an entry.
 */
export class LineCounter {
  private line: CountingLine;
  private readonly states = new Map<number, CrossingState>();

  constructor(line: CountingLine = DEFAULT_COUNTING_LINE) {
    this.line = { ...line };
  }

  getLine(): Readonly<CountingLine> {
    return this.line;
  }

  /** Replaces the line; crossing history measured against the old one is discarded. */
  setLine(line: CountingLine): void {
    this.line = { ...line };
    this.states.clear();
  }

  checkCrossing(trackId: number, box: Box): CrossingResult {
    const state = this.stateFor(trackId);
    state.centers.push(boxCenter(box));

    const previous = state.centers.at(-2);
    const current = state.centers.last();
    if (state.hasCrossed || !previous || !current) {
      return 'none';
    }

    if (this.side(previous) * this.side(current) >= 0) {
      return 'none';
    }

    state.hasCrossed = true;
    state.direction = current.y > previous.y ? 'exit' : 'entry';
    return state.direction;
  }

  /** Forgets tracks that are no longer live. */
  retain(activeIds: Iterable<number>): void {
    const keep = new Set(activeIds);
    for (const trackId of Array.from(this.states.keys())) {
      if (!keep.has(trackId)) {
        this.states.delete(trackId);
      }
    }
  }

  stateOf(trackId: number): CrossingView | undefined {
    const state = this.states.get(trackId);
    return state
      ? { hasCrossed: state.hasCrossed, direction: state.direction, centers: state.centers.toArray() }
      : undefined;
  }

  get trackedCount(): number {
    return this.states.size;
  }

  reset(): void {
    this.states.clear();
  }

  private stateFor(trackId: number): CrossingState {
    let state = this.states.get(trackId);
    if (!state) {
      state = { centers: new RingBuffer<Point>(CENTER_HISTORY), hasCrossed: false, direction: null };
      this.states.set(trackId, state);
    }
    return state;
  }

  private side(point: Point): number {
    const { startX, startY, endX, endY } = this.line;
    return (point.x - startX) * (endY - startY) - (point.y - startY) * (endX - startX);
  }
}
