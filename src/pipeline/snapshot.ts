import type { AnalyticsSnapshotDocument } from '../../libs/common/src/kafka/analytics.types';
import { CrowdAnalysis, DensityBand, Zone, ZoneOccupancy, ZoneType } from '../analysis/analysis.types';
import { AnalysisMode } from './analysis-mode';

export interface Counters {
  readonly currentCount: number;
  readonly totalEntries: number;
  readonly totalExits: number;
  readonly uniqueVisitors: number;
  readonly fps: number;
}

export const ZERO_COUNTERS: Counters = Object.freeze({
  currentCount: 0,
  totalEntries: 0,
  totalExits: 0,
  uniqueVisitors: 0,
  fps: 0,
});

export interface ZoneSnapshot {
  readonly name: string;
  readonly type: ZoneType;
  readonly count: number;
  readonly rollingAverage: number;
  readonly capacity: number;
  readonly occupancyPercent: number;
}

export interface CrowdSnapshot {
  readonly active: boolean;
  readonly estimatedCount: number;
  readonly confidence: number;
  readonly band: DensityBand;
}

export interface AnalyticsSnapshot extends Counters {
  readonly timestamp: string;
  readonly mode: AnalysisMode;
  readonly zones: Readonly<Record<string, ZoneSnapshot>>;
  readonly crowd: CrowdSnapshot;
}

export interface SnapshotInput {
  timestamp: Date;
  mode: AnalysisMode;
  counters: Counters;
  zones: readonly Readonly<Zone>[];
  occupancy: (zoneId: string) => Readonly<ZoneOccupancy>;
  crowd: Pick<CrowdAnalysis, 'inCrowdMode' | 'estimatedCount' | 'confidence' | 'band'>;
}

/** Zero when the zone has no capacity. */
export function occupancyPercent(count: number, capacity: number): number {
  return capacity > 0 ? (count / capacity) * 100 : 0;
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    Object.values(value).forEach((child) => deepFreeze(child));
  }
  return value;
}

export function buildSnapshot(input: SnapshotInput): AnalyticsSnapshot {
  const zones: Record<string, ZoneSnapshot> = {};
  for (const zone of input.zones) {
    const { count, rollingAverage } = input.occupancy(zone.id);
    zones[zone.id] = {
      name: zone.name,
      type: zone.type,
      count,
      rollingAverage,
      capacity: zone.capacity,
      occupancyPercent: occupancyPercent(count, zone.capacity),
    };
  }

  return deepFreeze({
    timestamp: input.timestamp.toISOString(),
    mode: input.mode,
    ...input.counters,
    zones,
    crowd: {
      active: input.crowd.inCrowdMode,
      estimatedCount: input.crowd.estimatedCount,
      confidence: input.crowd.confidence,
      band: input.crowd.band,
    },
  });
}

export function toSnapshotDocument(snapshot: AnalyticsSnapshot): AnalyticsSnapshotDocument {
  return {
    timestamp: snapshot.timestamp,
    mode: snapshot.mode,
    current_count: snapshot.currentCount,
    total_entries: snapshot.totalEntries,
    total_exits: snapshot.totalExits,
    unique_visitors: snapshot.uniqueVisitors,
    fps: snapshot.fps,
    zones: Object.entries(snapshot.zones).map(([zoneId, zone]) => ({
      zone_id: zoneId,
      name: zone.name,
      type: zone.type,
      count: zone.count,
      rolling_average: zone.rollingAverage,
      capacity: zone.capacity,
      occupancy_percent: zone.occupancyPercent,
    })),
    crowd_mode: snapshot.crowd.active,
    crowd_confidence: snapshot.crowd.confidence,
    density_band: snapshot.crowd.band,
    estimated_count: snapshot.crowd.estimatedCount,
  };
}
