import { Injectable, OnModuleInit, OnModuleDestroy, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Kafka, Producer, logLevel } from 'kafkajs';
import { AnalyticsSnapshotDocument } from './analytics.types';

@Injectable()
export class KafkaProducerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(KafkaProducerService.name);
  private kafka: Kafka;
  private producer: Producer;
  private isConnected = false;
  private retryTimer: NodeJS.Timeout | null = null;

  constructor(private readonly configService: ConfigService) {
    const broker = this.configService.get<string>('kafka.broker') || 'localhost:9092';
    const clientId = this.configService.get<string>('kafka.producer.clientId') || 'footfall-producer';
    const connectionTimeout = this.configService.get<number>('kafka.connectionTimeout', 3000);
    const requestTimeout = this.configService.get<number>('kafka.requestTimeout', 30000);

    this.kafka = new Kafka({
      clientId,
      brokers: broker.split(',').map((b) => b.trim()),
      connectionTimeout,
      requestTimeout,
      logLevel: logLevel.WARN,
    });

    this.producer = this.kafka.producer({
      allowAutoTopicCreation: true,
      retry: {
        retries: this.configService.get<number>('kafka.retry.retries', 5),
        initialRetryTime: this.configService.get<number>('kafka.retry.initialRetryTime', 100),
        multiplier: this.configService.get<number>('kafka.retry.multiplier', 2),
      },
    });
  }

  async onModuleInit() {
    if (!this.isEnabled()) {
      this.logger.log('Kafka producer disabled by configuration');
      return;
    }
    // Connect in background, don't block application startup
    this.connectWithRetry().catch((error: unknown) => {
      this.logger.warn(
        `Kafka producer will retry connection in background: ${error instanceof Error ? error.message : error}`,
      );
    });
  }

  async onModuleDestroy() {
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
    await this.disconnect();
  }

  isEnabled(): boolean {
    return this.configService.get<boolean>('kafka.enabled', true);
  }

  private async connect() {
    try {
      await this.producer.connect();
      this.isConnected = true;
      this.logger.log('Kafka producer connected successfully');
      return true;
    } catch (error) {
      this.logger.error('Failed to connect Kafka producer', error);
      this.isConnected = false;
      return false;
    }
  }

  private async connectWithRetry(): Promise<void> {
    const maxRetries = this.configService.get<number>('kafka.retry.retries', 5);
    const initialRetryTime = this.configService.get<number>('kafka.retry.initialRetryTime', 100);
    const multiplier = this.configService.get<number>('kafka.retry.multiplier', 2);

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      const connected = await this.connect();
      if (connected) {
        return;
      }

      if (attempt < maxRetries - 1) {
        const retryTime = initialRetryTime * Math.pow(multiplier, attempt);
        this.logger.warn(
          `Kafka producer connection failed. Retrying in ${retryTime}ms (attempt ${attempt + 1}/${maxRetries})`,
        );
        await new Promise((resolve) => setTimeout(resolve, retryTime));
      }
    }

    this.logger.error(
      `Kafka producer failed to connect after ${maxRetries} attempts. Will continue retrying in background.`,
    );
    this.retryTimer = setTimeout(() => {
      this.connectWithRetry().catch((error: unknown) => {
        this.logger.error('Kafka producer background retry failed', error);
      });
    }, 10000);
  }

  private async disconnect() {
    try {
      if (this.isConnected) {
        await this.producer.disconnect();
        this.isConnected = false;
        this.logger.log('Kafka producer disconnected');
      }
    } catch (error) {
      this.logger.error('Error disconnecting Kafka producer', error);
    }
  }

  /**
   * Publish one analytics snapshot. All snapshots share one key, so they land
   * on a single partition in production order.
   * Returns false while the broker is unreachable; the next cadence tick retries.
   */
  async publishSnapshot(document: AnalyticsSnapshotDocument): Promise<boolean> {
    if (!this.isEnabled() || !this.isConnected) {
      this.logger.debug('Kafka producer not connected, snapshot not published');
      return false;
    }

    const topic = this.configService.get<string>('kafka.topics.analytics') || 'footfall.analytics.v1';
    try {
      const result = await this.producer.send({
        topic,
        messages: [{ key: 'snapshot', value: JSON.stringify(document) }],
      });
      this.logger.debug(
        `Snapshot sent - Topic: ${topic}, Partition: ${result[0]?.partition}, Offset: ${result[0]?.baseOffset}`,
      );
      return true;
    } catch (error) {
      this.logger.error('Error producing snapshot', error);
      throw error;
    }
  }
}
