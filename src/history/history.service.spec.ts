import { BadRequestException, ServiceUnavailableException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { DailyStats, ElasticService, HourlyStats } from '../../libs/common/src/elastic/elastic.service';
import { AnalyticsSnapshotDocument } from '../../libs/common/src/kafka/analytics.types';
import { HistoryService } from './history.service';

function document(timestamp: string, count: number, fps: number): AnalyticsSnapshotDocument {
  return {
    timestamp,
    mode: 'tracking',
    current_count: count,
    total_entries: 3,
    total_exits: 1,
    unique_visitors: 3,
    fps,
    zones: [],
    crowd_mode: false,
    crowd_confidence: 0.9,
    density_band: 'sparse',
    estimated_count: count,
  };
}

describe('HistoryService', () => {
  const now = new Date('2024-05-02T12:00:00.000Z');
  let getHistory: jest.Mock<Promise<AnalyticsSnapshotDocument[]>, [Date, Date]>;
  let getHourlyStats: jest.Mock<Promise<HourlyStats[]>, [string]>;
  let getDailyStats: jest.Mock<Promise<DailyStats[]>, [string, string]>;
  let elasticEnabled: boolean;
  let service: HistoryService;

  beforeEach(async () => {
    getHistory = jest.fn(async (_from: Date, _to: Date) => [
      document('2024-05-02T09:15:00.000Z', 2, 12.5),
      document('2024-05-02T09:15:01.000Z', 4, 20),
    ]);
    getHourlyStats = jest.fn(async (_date: string) => []);
    getDailyStats = jest.fn(async (_from: string, _to: string) => []);
    elasticEnabled = true;

    const moduleRef = await Test.createTestingModule({
      providers: [
        HistoryService,
        {
          provide: ElasticService,
          useValue: { getHistory, getHourlyStats, getDailyStats, isEnabled: () => elasticEnabled },
        },
      ],
    }).compile();
    service = moduleRef.get(HistoryService);
  });

  it('defaults the history window to the last 24 hours', async () => {
    await service.getHistory(undefined, undefined, now);

    expect(getHistory).toHaveBeenCalledWith(new Date('2024-05-01T12:00:00.000Z'), now);
  });

  it('rejects an unparseable or empty window', async () => {
    await expect(service.getHistory('yesterday', undefined, now)).rejects.toBeInstanceOf(BadRequestException);
    await expect(
      service.getHistory('2024-05-02T10:00:00Z', '2024-05-02T10:00:00Z', now),
    ).rejects.toBeInstanceOf(BadRequestException);
  });

  it('asks for today when no date is given', async () => {
    await service.getHourlyStats(undefined, now);
    expect(getHourlyStats).toHaveBeenCalledWith('2024-05-02');
  });

  it('rejects a malformed hourly date', async () => {
    await expect(service.getHourlyStats('02/05/2024', now)).rejects.toBeInstanceOf(BadRequestException);
  });

  it('asks for the last seven days including today when no range is given', async () => {
    await service.getDailyStats(undefined, undefined, now);

    expect(getDailyStats).toHaveBeenCalledWith('2024-04-26', '2024-05-02');
  });

  it('counts the default daily range back from an explicit end day', async () => {
    await service.getDailyStats(undefined, '2024-03-02', now);

    expect(getDailyStats).toHaveBeenCalledWith('2024-02-25', '2024-03-02');
  });

  it('passes an explicit daily range through, a single day included', async () => {
    await service.getDailyStats('2024-05-02', '2024-05-02', now);

    expect(getDailyStats).toHaveBeenCalledWith('2024-05-02', '2024-05-02');
  });

  it('rejects a malformed, reversed or overlong daily range', async () => {
    await expect(service.getDailyStats('2024-5-1', '2024-05-02', now)).rejects.toBeInstanceOf(BadRequestException);
    await expect(service.getDailyStats('2024-05-03', '2024-05-02', now)).rejects.toBeInstanceOf(BadRequestException);
    await expect(service.getDailyStats('2023-01-01', '2024-05-02', now)).rejects.toBeInstanceOf(BadRequestException);
    expect(getDailyStats).not.toHaveBeenCalled();
  });

  it('answers 503 for every history query while Elasticsearch is disabled', async () => {
    elasticEnabled = false;

    await expect(service.getHistory(undefined, undefined, now)).rejects.toBeInstanceOf(ServiceUnavailableException);
    await expect(service.getHourlyStats(undefined, now)).rejects.toBeInstanceOf(ServiceUnavailableException);
    await expect(service.getDailyStats(undefined, undefined, now)).rejects.toBeInstanceOf(ServiceUnavailableException);
    await expect(service.exportCsv(now)).rejects.toBeInstanceOf(ServiceUnavailableException);
    expect(getHistory).not.toHaveBeenCalled();
    expect(getHourlyStats).not.toHaveBeenCalled();
    expect(getDailyStats).not.toHaveBeenCalled();
  });

  it('exports the last day as CSV', async () => {
    const csv = await service.exportCsv(now);

    expect(csv).toBe(
      'Timestamp,Current Count,Total Entries,Total Exits,Unique Visitors,FPS\n' +
        '2024-05-02 09:15:00,2,3,1,3,12.5\n' +
        '2024-05-02 09:15:01,4,3,1,3,20\n',
    );
  });
});
