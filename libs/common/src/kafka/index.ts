export { KafkaModule } from './kafka.module';
export { KafkaConsumerService } from './consumer.service';
export { KafkaProducerService } from './producer.service';
export type {
  AnalyticsSnapshotDocument,
  DetectionFrameHandler,
  KafkaMessageMetadata,
  ZoneOccupancyDocument,
} from './analytics.types';
