/**
 * Footfall analytics – shared library public API.
 * Use this barrel for consistent imports from the app and other consumers.
 */

export { ConfigModule, appConfig, logLevelsFor } from './config';
export { KeyedStore, RingBuffer, mean } from './collections';
export { boxCenter, boxFromCenter, boxHeight, boxWidth, iou, pointInPolygon } from './geometry';
export type { Box, Point } from './geometry';
export {
  ElasticModule,
  ElasticService,
  ANALYTICS_SNAPSHOT_INDEX_NAME,
  ANALYTICS_SNAPSHOT_INDEX_MAPPING,
  ANALYTICS_SNAPSHOT_INDEX_SETTINGS,
} from './elastic';
export type { DailyStats, HourlyStats } from './elastic';
export { AllExceptionsFilter } from './filters';
export { LoggingInterceptor } from './interceptors';
export { KafkaModule, KafkaConsumerService, KafkaProducerService } from './kafka';
export type {
  AnalyticsSnapshotDocument,
  DetectionFrameHandler,
  KafkaMessageMetadata,
  ZoneOccupancyDocument,
} from './kafka';
