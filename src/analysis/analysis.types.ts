import type { Point } from '../../libs/common/src/geometry';

export interface CountingLine {
  startX: number;
  startY: number;
  endX: number;
  endY: number;
}

export const DEFAULT_COUNTING_LINE: Readonly<CountingLine> = Object.freeze({
  startX: 0,
  startY: 540,
  endX: 1920,
  endY: 540,
});

export type CrossingResult = 'entry' | 'exit' | 'none';

export enum ZoneType {
  Counting = 'counting',
  Entry = 'entry',
  Exit = 'exit',
  Exclusion = 'exclusion',
}

export interface Zone {
  id: string;
  name: string;
  points: readonly Point[];
  capacity: number;
  type: ZoneType;
}

export const DEFAULT_ZONE: Readonly<Zone> = Object.freeze({
  id: 'default',
  name: 'Main Area',
  points: [
    { x: 100, y: 100 },
    { x: 1820, y: 100 },
    { x: 1820, y: 980 },
    { x: 100, y: 980 },
  ],
  capacity: 100,
  type: ZoneType.Counting,
});

export interface ZoneOccupancy {
  count: number;
  rollingAverage: number;
}

export enum DensityBand {
  Empty = 'empty',
  Sparse = 'sparse',
  Moderate = 'moderate',
  Dense = 'dense',
  Packed = 'packed',
}

export interface CrowdAnalysis {
  estimatedCount: number;
  band: DensityBand;
  /** GRID_SIZE rows of GRID_SIZE cells, each the fraction of dark pixels. */
  densityMap: number[][];
  confidence: number;
  inCrowdMode: boolean;
}
