import { Controller, Get } from '@nestjs/common';
import { ElasticService } from '../../libs/common/src/elastic/elastic.service';
import { AnalysisMode } from '../pipeline/analysis-mode';
import { PipelineService } from '../pipeline/pipeline.service';

export type StorageHealth = 'up' | 'down' | 'disabled';

export interface HealthReport {
  status: 'ok';
  timestamp: string;
  service: string;
  mode: AnalysisMode;
  processedFrames: number;
  storage: StorageHealth;
}

/** Liveness probe for load balancers and container orchestrators. */
@Controller('health')
export class HealthController {
  constructor(
    private readonly pipelineService: PipelineService,
    private readonly elasticService: ElasticService,
  ) {}

  @Get()
  async check(): Promise<HealthReport> {
    const { mode, processedFrames } = this.pipelineService.getStatus();
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'footfall-analytics',
      mode,
      processedFrames,
      storage: await this.storageHealth(),
    };
  }

  // A down cluster does not fail the probe
  private async storageHealth(): Promise<StorageHealth> {
    if (!this.elasticService.isEnabled()) {
      return 'disabled';
    }
    return (await this.elasticService.checkConnection()) ? 'up' : 'down';
  }
}
