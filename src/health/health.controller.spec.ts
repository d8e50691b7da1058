import { Test } from '@nestjs/testing';
import { ElasticService } from '../../libs/common/src/elastic/elastic.service';
import { AnalysisMode } from '../pipeline/analysis-mode';
import { PipelineService } from '../pipeline/pipeline.service';
import { HealthController } from './health.controller';

describe('HealthController', () => {
  let elasticEnabled: boolean;
  let reachable: boolean;
  let controller: HealthController;

  beforeEach(async () => {
    elasticEnabled = true;
    reachable = true;

    const moduleRef = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        {
          provide: PipelineService,
          useValue: { getStatus: () => ({ mode: AnalysisMode.Crowd, processedFrames: 12 }) },
        },
        {
          provide: ElasticService,
          useValue: { isEnabled: () => elasticEnabled, checkConnection: async () => reachable },
        },
      ],
    }).compile();

    controller = moduleRef.get(HealthController);
  });

  it('reports the service name with the pipeline mode', async () => {
    expect(await controller.check()).toEqual({
      status: 'ok',
      timestamp: expect.any(String),
      service: 'footfall-analytics',
      mode: 'crowd',
      processedFrames: 12,
      storage: 'up',
    });
  });

  it('stays ok when Elasticsearch is unreachable', async () => {
    reachable = false;
    const report = await controller.check();

    expect(report.status).toBe('ok');
    expect(report.storage).toBe('down');
  });

  it('reports disabled storage without probing it', async () => {
    elasticEnabled = false;

    expect((await controller.check()).storage).toBe('disabled');
  });
});
