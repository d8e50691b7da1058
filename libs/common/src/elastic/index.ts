export { ElasticModule } from './elastic.module';
export { ElasticService } from './elastic.service';
export type { DailyStats, HourlyStats } from './elastic.service';
export {
  ANALYTICS_SNAPSHOT_INDEX_NAME,
  ANALYTICS_SNAPSHOT_INDEX_MAPPING,
  ANALYTICS_SNAPSHOT_INDEX_SETTINGS,
} from './analytics-snapshot.index';
