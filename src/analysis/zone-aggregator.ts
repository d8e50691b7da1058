import { Box, boxCenter, pointInPolygon } from '../../libs/common/src/geometry';
import { KeyedStore, mean, RingBuffer } from '../../libs/common/src/collections';
import { Zone, ZoneOccupancy } from './analysis.types';
import { GRID_SIZE } from './density-signals';

export const ZONE_HISTORY = 30;
/**
 * Scales summed cell density to people in crowd mode. A zone covering the
 * whole frame at uniform density `d` reports `2 × d × capacity`.
 */
export const CROWD_ZONE_FILL_FACTOR = 2 / (GRID_SIZE * GRID_SIZE);

const EMPTY_OCCUPANCY: Readonly<ZoneOccupancy> = Object.freeze({ count: 0, rollingAverage: 0 });

/**
 * Per-zone occupancy with a rolling average over the last {@link ZONE_HISTORY} updates.
 *
 * Written by the frame pipeline only; `occupancy` and `view` may be read at
 * any time and always return whole, frozen values.
 */
export class ZoneAggregator {
  private readonly published = new KeyedStore<string, ZoneOccupancy>();
  private readonly history = new Map<string, RingBuffer<number>>();

  update(zoneId: string, count: number): Readonly<ZoneOccupancy> {
    let ring = this.history.get(zoneId);
    if (!ring) {
      ring = new RingBuffer<number>(ZONE_HISTORY);
      this.history.set(zoneId, ring);
    }
    ring.push(count);
    return this.published.set(zoneId, { count, rollingAverage: mean(ring.toArray()) });
  }

  occupancy(zoneId: string): Readonly<ZoneOccupancy> {
    return this.published.get(zoneId) ?? EMPTY_OCCUPANCY;
  }

  view(): ReadonlyMap<string, Readonly<ZoneOccupancy>> {
    return this.published.view();
  }

  /** Counts track centres inside each zone polygon. */
  updateFromTracks(zones: readonly Zone[], tracks: readonly { box: Box }[]): void {
    const centers = tracks.map((track) => boxCenter(track.box));
    for (const zone of zones) {
      const count = centers.filter((center) => pointInPolygon(center, zone.points)).length;
      this.update(zone.id, count);
    }
  }

  /**
   * Crowd-mode approximation: summed density of the grid cells whose centre
   * lies inside the zone, times capacity and {@link CROWD_ZONE_FILL_FACTOR}.
   */
  updateFromDensityMap(
    zones: readonly Zone[],
    densityMap: readonly (readonly number[])[],
    frameWidth: number,
    frameHeight: number,
  ): void {
    const cellWidth = Math.floor(frameWidth / GRID_SIZE);
    const cellHeight = Math.floor(frameHeight / GRID_SIZE);

    for (const zone of zones) {
      if (cellWidth === 0 || cellHeight === 0) {
        this.update(zone.id, 0);
        continue;
      }

      let density = 0;
      densityMap.forEach((row, gy) => {
        row.forEach((cell, gx) => {
          const center = { x: (gx + 0.5) * cellWidth, y: (gy + 0.5) * cellHeight };
          if (pointInPolygon(center, zone.points)) {
            density += cell;
          }
        });
      });

      this.update(zone.id, Math.round(density * zone.capacity * CROWD_ZONE_FILL_FACTOR));
    }
  }

  reset(): void {
    this.published.clear();
    this.history.clear();
  }
}
