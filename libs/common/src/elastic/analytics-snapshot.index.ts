/**
 * footfall-analytics index definition.
 * One document per published snapshot (counters, crowd state, per-zone occupancy).
 */

export const ANALYTICS_SNAPSHOT_INDEX_NAME = 'footfall-analytics';

export const ANALYTICS_SNAPSHOT_INDEX_MAPPING = {
  properties: {
    timestamp: {
      type: 'date' as const,
      format: 'strict_date_optional_time||epoch_millis',
    },
    mode: { type: 'keyword' as const },
    current_count: { type: 'integer' as const },
    total_entries: { type: 'integer' as const },
    total_exits: { type: 'integer' as const },
    unique_visitors: { type: 'integer' as const },
    fps: { type: 'float' as const },
    crowd_mode: { type: 'boolean' as const },
    crowd_confidence: { type: 'float' as const },
    density_band: { type: 'keyword' as const },
    estimated_count: { type: 'integer' as const },
    zones: {
      type: 'nested' as const,
      properties: {
        zone_id: { type: 'keyword' as const },
        name: { type: 'keyword' as const },
        type: { type: 'keyword' as const },
        count: { type: 'integer' as const },
        rolling_average: { type: 'float' as const },
        capacity: { type: 'integer' as const },
        occupancy_percent: { type: 'float' as const },
      },
    },
    indexed_at: { type: 'date' as const },
  },
};

export const ANALYTICS_SNAPSHOT_INDEX_SETTINGS = {
  number_of_shards: 1,
  number_of_replicas: 0,
};
