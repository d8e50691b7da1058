import { Module } from '@nestjs/common';
import { ConfigModule } from '../libs/common/src/config';
import { KafkaModule } from '../libs/common/src/kafka';
import { CalibrationModule } from './calibration/calibration.module';
import { HealthModule } from './health/health.module';
import { HistoryModule } from './history/history.module';
import { PipelineModule } from './pipeline/pipeline.module';
import { ReplayModule } from './replay/replay.module';

@Module({
  imports: [ConfigModule, KafkaModule, CalibrationModule, PipelineModule, HistoryModule, ReplayModule, HealthModule],
})
export class AppModule {}
