import { Module } from '@nestjs/common';
import { ElasticModule } from '../../libs/common/src/elastic';
import { KafkaModule } from '../../libs/common/src/kafka';
import { CalibrationModule } from '../calibration/calibration.module';
import { FrameIngestService } from './frame-ingest.service';
import { PayloadDetector, PERSON_DETECTOR } from './person-detector';
import { PipelineController } from './pipeline.controller';
import { PipelineService } from './pipeline.service';
import { SnapshotPublisherService } from './snapshot-publisher.service';

@Module({
  imports: [CalibrationModule, KafkaModule, ElasticModule],
  controllers: [PipelineController],
  providers: [
    { provide: PERSON_DETECTOR, useClass: PayloadDetector },
    PipelineService,
    SnapshotPublisherService,
    FrameIngestService,
  ],
  exports: [PipelineService],
})
export class PipelineModule {}
