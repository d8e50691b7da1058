import { Module } from '@nestjs/common';
import { ElasticModule } from '../../libs/common/src/elastic';
import { PipelineModule } from '../pipeline/pipeline.module';
import { HealthController } from './health.controller';

@Module({
  imports: [PipelineModule, ElasticModule],
  controllers: [HealthController],
})
export class HealthModule {}
