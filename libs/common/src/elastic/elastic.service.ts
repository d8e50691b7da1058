import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Client, ClientOptions } from '@elastic/elasticsearch';
import { AnalyticsSnapshotDocument } from '../kafka/analytics.types';
import {
  ANALYTICS_SNAPSHOT_INDEX_MAPPING,
  ANALYTICS_SNAPSHOT_INDEX_NAME,
  ANALYTICS_SNAPSHOT_INDEX_SETTINGS,
} from './analytics-snapshot.index';
import {
  DailyAggregations,
  DailyStats,
  HourlyAggregations,
  HourlyStats,
  SNAPSHOT_METRIC_AGGS,
  toDailyStats,
  toHourlyStats,
} from './snapshot-stats';

export type { DailyStats, HourlyStats } from './snapshot-stats';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

@Injectable()
export class ElasticService implements OnModuleInit {
  private readonly logger = new Logger(ElasticService.name);
  private client: Client;
  private indexName: string;

  constructor(private readonly configService: ConfigService) {
    const node = this.configService.get<string>('elasticsearch.node') || 'http://localhost:9200';
    const username = this.configService.get<string>('elasticsearch.username') || 'elastic';
    const password = this.configService.get<string>('elasticsearch.password') || 'changeme';
    this.indexName =
      this.configService.get<string>('elasticsearch.index') || ANALYTICS_SNAPSHOT_INDEX_NAME;
    const requestTimeout = this.configService.get<number>('elasticsearch.requestTimeout', 30000);

    const clientOptions: ClientOptions = {
      node,
      auth: {
        username,
        password,
      },
      requestTimeout,
      maxRetries: 5,
    };

    this.client = new Client(clientOptions);
  }

  async onModuleInit() {
    if (!this.isEnabled()) {
      this.logger.log('Elasticsearch disabled by configuration');
      return;
    }
    // Storage is a downstream sink; an unreachable cluster must not stop frame processing
    try {
      await this.ensureIndexExists();
    } catch (error) {
      this.logger.warn(`Elasticsearch unavailable at startup: ${errorMessage(error)}`);
    }
  }

  isEnabled(): boolean {
    return this.configService.get<boolean>('elasticsearch.enabled', true);
  }

  /**
   * Ensure the snapshot index exists, create it if it doesn't
   */
  private async ensureIndexExists() {
    try {
      const exists = await this.client.indices.exists({ index: this.indexName });
      if (!exists) {
        this.logger.log(`Creating Elasticsearch index: ${this.indexName}`);
        await this.client.indices.create({
          index: this.indexName,
          settings: ANALYTICS_SNAPSHOT_INDEX_SETTINGS,
          mappings: ANALYTICS_SNAPSHOT_INDEX_MAPPING,
        });
        this.logger.log(`Elasticsearch index '${this.indexName}' created successfully`);
      } else {
        this.logger.log(`Elasticsearch index '${this.indexName}' already exists`);
      }
    } catch (error) {
      this.logger.error(`Error ensuring index exists: ${errorMessage(error)}`);
      throw error;
    }
  }

  /**
   * Index a single analytics snapshot
   */
  async indexSnapshot(document: AnalyticsSnapshotDocument): Promise<void> {
    try {
      const response = await this.client.index({
        index: this.indexName,
        document: {
          ...document,
          indexed_at: new Date().toISOString(),
        },
      });
      this.logger.debug(`Snapshot indexed - ID: ${response._id}, Index: ${this.indexName}`);
    } catch (error) {
      this.logger.error(`Error indexing snapshot: ${errorMessage(error)}`);
      throw error;
    }
  }

  /**
   * Bulk index snapshots (e.g. after a replay)
   */
  async bulkIndexSnapshots(documents: AnalyticsSnapshotDocument[]): Promise<void> {
    if (documents.length === 0) {
      return;
    }

    try {
      const indexedAt = new Date().toISOString();
      const operations = documents.flatMap((document) => [
        { index: { _index: this.indexName } },
        { ...document, indexed_at: indexedAt },
      ]);

      const response = await this.client.bulk({ operations, refresh: 'wait_for' });

      if (response.errors) {
        const erroredItems = response.items.filter((item) => item.index?.error);
        this.logger.error(`Bulk index had ${erroredItems.length} errors out of ${documents.length} snapshots`);
        erroredItems.forEach((item) => {
          this.logger.error(`Bulk index error: ${JSON.stringify(item.index?.error)}`);
        });
      } else {
        this.logger.log(`Successfully bulk indexed ${documents.length} snapshots to ${this.indexName}`);
      }
    } catch (error) {
      this.logger.error(`Error bulk indexing snapshots: ${errorMessage(error)}`);
      throw error;
    }
  }

  /**
   * Snapshots with `from <= timestamp < to`, oldest first
   */
  async getHistory(from: Date, to: Date, size = 10000): Promise<AnalyticsSnapshotDocument[]> {
    const response = await this.client.search<AnalyticsSnapshotDocument>({
      index: this.indexName,
      size,
      query: {
        range: {
          timestamp: { gte: from.toISOString(), lt: to.toISOString() },
        },
      },
      sort: [{ timestamp: { order: 'asc' } }],
    });

    return response.hits.hits.flatMap((hit) => (hit._source ? [hit._source] : []));
  }

  /**
   * Per-hour aggregates for one UTC day (`YYYY-MM-DD`). Entries and exits are
   * the growth of the cumulative counters inside the hour.
   */
  async getHourlyStats(date: string): Promise<HourlyStats[]> {
    const dayStart = `${date}T00:00:00.000Z`;
    const response = await this.client.search<AnalyticsSnapshotDocument, HourlyAggregations>({
      index: this.indexName,
      size: 0,
      query: {
        range: {
          timestamp: { gte: dayStart, lt: `${dayStart}||+1d` },
        },
      },
      aggs: {
        by_hour: {
          date_histogram: { field: 'timestamp', fixed_interval: '1h', min_doc_count: 1 },
          aggs: SNAPSHOT_METRIC_AGGS,
        },
      },
    });

    return (response.aggregations?.by_hour.buckets ?? []).map(toHourlyStats);
  }

  /**
   * Per-day rollups for the UTC days `from` to `to` inclusive, each with the
   * hour whose average count peaked.
   */
  async getDailyStats(from: string, to: string): Promise<DailyStats[]> {
    const response = await this.client.search<AnalyticsSnapshotDocument, DailyAggregations>({
      index: this.indexName,
      size: 0,
      query: {
        range: {
          timestamp: { gte: `${from}T00:00:00.000Z`, lt: `${to}T00:00:00.000Z||+1d` },
        },
      },
      aggs: {
        by_day: {
          date_histogram: { field: 'timestamp', calendar_interval: '1d', min_doc_count: 1 },
          aggs: {
            ...SNAPSHOT_METRIC_AGGS,
            by_hour: {
              date_histogram: { field: 'timestamp', fixed_interval: '1h', min_doc_count: 1 },
              aggs: { avg_count: SNAPSHOT_METRIC_AGGS.avg_count },
            },
          },
        },
      },
    });

    return (response.aggregations?.by_day.buckets ?? []).map(toDailyStats);
  }

  /**
   * Check if Elasticsearch is connected
   */
  async checkConnection(): Promise<boolean> {
    try {
      return await this.client.ping();
    } catch (error) {
      this.logger.error(`Elasticsearch connection check failed: ${errorMessage(error)}`);
      return false;
    }
  }
}
