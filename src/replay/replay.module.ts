import { Module } from '@nestjs/common';
import { ElasticModule } from '../../libs/common/src/elastic';
import { PipelineModule } from '../pipeline/pipeline.module';
import { ReplayController } from './replay.controller';
import { ReplayService } from './replay.service';

@Module({
  imports: [PipelineModule, ElasticModule],
  controllers: [ReplayController],
  providers: [ReplayService],
})
export class ReplayModule {}
