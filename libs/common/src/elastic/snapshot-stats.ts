export interface HourlyStats {
  hour: string;
  samples: number;
  avgCount: number;
  maxCount: number;
  totalEntries: number;
  totalExits: number;
  uniqueVisitors: number;
}

export interface DailyStats {
  date: string;
  samples: number;
  avgCount: number;
  maxCount: number;
  totalEntries: number;
  totalExits: number;
  uniqueVisitors: number;
  /** UTC hour (0-23) with the highest average count; the earliest wins a tie. */
  peakHour: number;
}

export type MetricValue = { value: number | null };

/** Metrics shared by the hourly and daily histograms. */
export interface SnapshotMetricsBucket {
  key: number;
  key_as_string?: string;
  doc_count: number;
  avg_count: MetricValue;
  max_count: MetricValue;
  min_entries: MetricValue;
  max_entries: MetricValue;
  min_exits: MetricValue;
  max_exits: MetricValue;
  max_unique: MetricValue;
}

export interface HourlyAggregations {
  by_hour: { buckets: SnapshotMetricsBucket[] };
}

export interface DailyBucket extends SnapshotMetricsBucket {
  by_hour: { buckets: Array<{ key: number; avg_count: MetricValue }> };
}

export interface DailyAggregations {
  by_day: { buckets: DailyBucket[] };
}

export const SNAPSHOT_METRIC_AGGS = {
  avg_count: { avg: { field: 'current_count' } },
  max_count: { max: { field: 'current_count' } },
  min_entries: { min: { field: 'total_entries' } },
  max_entries: { max: { field: 'total_entries' } },
  min_exits: { min: { field: 'total_exits' } },
  max_exits: { max: { field: 'total_exits' } },
  max_unique: { max: { field: 'unique_visitors' } },
} as const;

function bucketKey(bucket: SnapshotMetricsBucket): string {
  return bucket.key_as_string ?? new Date(bucket.key).toISOString();
}

// Entries and exits are cumulative counters, so growth inside a bucket is max - min
function metrics(bucket: SnapshotMetricsBucket) {
  return {
    samples: bucket.doc_count,
    avgCount: bucket.avg_count.value ?? 0,
    maxCount: bucket.max_count.value ?? 0,
    totalEntries: (bucket.max_entries.value ?? 0) - (bucket.min_entries.value ?? 0),
    totalExits: (bucket.max_exits.value ?? 0) - (bucket.min_exits.value ?? 0),
    uniqueVisitors: bucket.max_unique.value ?? 0,
  };
}

export function toHourlyStats(bucket: SnapshotMetricsBucket): HourlyStats {
  return { hour: bucketKey(bucket), ...metrics(bucket) };
}

export function toDailyStats(bucket: DailyBucket): DailyStats {
  let peakHour = 0;
  let peakAverage = -Infinity;
  for (const hour of bucket.by_hour.buckets) {
    const average = hour.avg_count.value;
    if (average !== null && average > peakAverage) {
      peakAverage = average;
      peakHour = new Date(hour.key).getUTCHours();
    }
  }
  return { date: bucketKey(bucket).slice(0, 10), ...metrics(bucket), peakHour };
}
