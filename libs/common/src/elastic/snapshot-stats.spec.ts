import { DailyBucket, SnapshotMetricsBucket, toDailyStats, toHourlyStats } from './snapshot-stats';

function metricsBucket(key: string, overrides: Partial<SnapshotMetricsBucket> = {}): SnapshotMetricsBucket {
  return {
    key: Date.parse(key),
    key_as_string: key,
    doc_count: 120,
    avg_count: { value: 4.5 },
    max_count: { value: 9 },
    min_entries: { value: 10 },
    max_entries: { value: 17 },
    min_exits: { value: 8 },
    max_exits: { value: 12 },
    max_unique: { value: 17 },
    ...overrides,
  };
}

function hour(iso: string, average: number | null) {
  return { key: Date.parse(iso), avg_count: { value: average } };
}

describe('snapshot stats', () => {
  it('turns cumulative counters into per-hour growth', () => {
    expect(toHourlyStats(metricsBucket('2024-05-02T09:00:00.000Z'))).toEqual({
      hour: '2024-05-02T09:00:00.000Z',
      samples: 120,
      avgCount: 4.5,
      maxCount: 9,
      totalEntries: 7,
      totalExits: 4,
      uniqueVisitors: 17,
    });
  });

  it('reads missing metrics as zero', () => {
    const stats = toHourlyStats(
      metricsBucket('2024-05-02T09:00:00.000Z', {
        avg_count: { value: null },
        min_exits: { value: null },
        max_exits: { value: null },
        max_unique: { value: null },
      }),
    );

    expect(stats.avgCount).toBe(0);
    expect(stats.totalExits).toBe(0);
    expect(stats.uniqueVisitors).toBe(0);
  });

  it('rolls a day up with the hour whose average peaked', () => {
    const bucket: DailyBucket = {
      ...metricsBucket('2024-05-02T00:00:00.000Z'),
      by_hour: {
        buckets: [
          hour('2024-05-02T08:00:00.000Z', 2),
          hour('2024-05-02T13:00:00.000Z', 7.25),
          hour('2024-05-02T17:00:00.000Z', 7.25),
          hour('2024-05-02T20:00:00.000Z', null),
        ],
      },
    };

    expect(toDailyStats(bucket)).toEqual({
      date: '2024-05-02',
      samples: 120,
      avgCount: 4.5,
      maxCount: 9,
      totalEntries: 7,
      totalExits: 4,
      uniqueVisitors: 17,
      peakHour: 13,
    });
  });

  it('falls back to midnight when a day has no hourly averages', () => {
    const bucket: DailyBucket = { ...metricsBucket('2024-05-02T00:00:00.000Z'), by_hour: { buckets: [] } };

    expect(toDailyStats(bucket).peakHour).toBe(0);
  });
});
