import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ElasticService } from '../../libs/common/src/elastic/elastic.service';
import { KafkaProducerService } from '../../libs/common/src/kafka/producer.service';
import { PipelineService } from './pipeline.service';
import { toSnapshotDocument } from './snapshot';

/**
 * Pushes the latest snapshot to Kafka and Elasticsearch on a fixed cadence,
 * independent of the frame rate.
 */
@Injectable()
export class SnapshotPublisherService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SnapshotPublisherService.name);
  private intervalId: NodeJS.Timeout | null = null;
  private publishing = false;

  constructor(
    private readonly pipelineService: PipelineService,
    private readonly producerService: KafkaProducerService,
    private readonly elasticService: ElasticService,
    private readonly configService: ConfigService,
  ) {}

  onModuleInit() {
    if (!this.configService.get<boolean>('pipeline.publishEnabled', true)) {
      this.logger.log('Snapshot publishing disabled by configuration');
      return;
    }

    const intervalMs = this.configService.get<number>('pipeline.publishIntervalMs', 1000);
    this.intervalId = setInterval(async () => {
      try {
        await this.publishOnce();
      } catch (error) {
        this.logger.error('Error during snapshot publish cycle', error);
      }
    }, intervalMs);
    this.logger.log(`Publishing snapshots every ${intervalMs}ms`);
  }

  onModuleDestroy() {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }

  /**
   * Publishes the current snapshot to every enabled sink. Returns false when
   * the previous cycle is still running and this one was skipped.
   */
  async publishOnce(): Promise<boolean> {
    if (this.publishing) {
      this.logger.debug('Previous publish still running, skipping cycle');
      return false;
    }
    this.publishing = true;

    try {
      const document = toSnapshotDocument(this.pipelineService.getSnapshot());
      const sinks: Array<{ name: string; run: () => Promise<unknown> }> = [
        { name: 'kafka', run: () => this.producerService.publishSnapshot(document) },
      ];
      if (this.elasticService.isEnabled()) {
        sinks.push({ name: 'elasticsearch', run: () => this.elasticService.indexSnapshot(document) });
      }

      const results = await Promise.allSettled(sinks.map((sink) => sink.run()));
      results.forEach((result, index) => {
        if (result.status === 'rejected') {
          this.logger.warn(
            `Snapshot not delivered to ${sinks[index].name}: ${
              result.reason instanceof Error ? result.reason.message : String(result.reason)
            }`,
          );
        }
      });
      return true;
    } finally {
      this.publishing = false;
    }
  }
}
