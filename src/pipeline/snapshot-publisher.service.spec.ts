import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { ElasticService } from '../../libs/common/src/elastic/elastic.service';
import { AnalyticsSnapshotDocument } from '../../libs/common/src/kafka/analytics.types';
import { KafkaProducerService } from '../../libs/common/src/kafka/producer.service';
import { DensityBand } from '../analysis/analysis.types';
import { AnalysisMode } from './analysis-mode';
import { PipelineService } from './pipeline.service';
import { buildSnapshot, ZERO_COUNTERS } from './snapshot';
import { SnapshotPublisherService } from './snapshot-publisher.service';

describe('SnapshotPublisherService', () => {
  const snapshot = buildSnapshot({
    timestamp: new Date('2024-05-01T10:00:00.000Z'),
    mode: AnalysisMode.Tracking,
    counters: { ...ZERO_COUNTERS, currentCount: 4 },
    zones: [],
    occupancy: () => ({ count: 0, rollingAverage: 0 }),
    crowd: { inCrowdMode: false, estimatedCount: 4, confidence: 0.9, band: DensityBand.Sparse },
  });

  let publishSnapshot: jest.Mock<Promise<boolean>, [AnalyticsSnapshotDocument]>;
  let indexSnapshot: jest.Mock<Promise<void>, [AnalyticsSnapshotDocument]>;
  let elasticEnabled: boolean;
  let publisher: SnapshotPublisherService;

  beforeEach(async () => {
    publishSnapshot = jest.fn(async (_document: AnalyticsSnapshotDocument) => true);
    indexSnapshot = jest.fn(async (_document: AnalyticsSnapshotDocument) => undefined);
    elasticEnabled = true;

    const moduleRef = await Test.createTestingModule({
      providers: [
        SnapshotPublisherService,
        { provide: PipelineService, useValue: { getSnapshot: () => snapshot } },
        { provide: KafkaProducerService, useValue: { publishSnapshot } },
        { provide: ElasticService, useValue: { indexSnapshot, isEnabled: () => elasticEnabled } },
        { provide: ConfigService, useValue: new ConfigService({ pipeline: { publishEnabled: false } }) },
      ],
    }).compile();

    publisher = moduleRef.get(SnapshotPublisherService);
  });

  it('sends the current snapshot to both sinks', async () => {
    expect(await publisher.publishOnce()).toBe(true);

    expect(publishSnapshot).toHaveBeenCalledTimes(1);
    expect(publishSnapshot.mock.calls[0][0]).toEqual(
      expect.objectContaining({ timestamp: '2024-05-01T10:00:00.000Z', current_count: 4, estimated_count: 4 }),
    );
    expect(indexSnapshot).toHaveBeenCalledWith(publishSnapshot.mock.calls[0][0]);
  });

  it('skips Elasticsearch when it is disabled', async () => {
    elasticEnabled = false;
    await publisher.publishOnce();

    expect(indexSnapshot).not.toHaveBeenCalled();
    expect(publishSnapshot).toHaveBeenCalledTimes(1);
  });

  it('keeps going when one sink fails', async () => {
    publishSnapshot.mockRejectedValueOnce(new Error('broker down'));

    expect(await publisher.publishOnce()).toBe(true);
    expect(indexSnapshot).toHaveBeenCalledTimes(1);
  });

  it('skips a cycle while the previous one is still running', async () => {
    let finish: () => void = () => undefined;
    indexSnapshot.mockImplementationOnce(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        }),
    );

    const running = publisher.publishOnce();
    expect(await publisher.publishOnce()).toBe(false);

    finish();
    expect(await running).toBe(true);
    expect(await publisher.publishOnce()).toBe(true);
  });
});
