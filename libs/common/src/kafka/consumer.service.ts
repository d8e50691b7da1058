import { Injectable, OnModuleInit, OnModuleDestroy, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Kafka, Consumer, EachMessagePayload, logLevel } from 'kafkajs';
import { DetectionFrameHandler, KafkaMessageMetadata } from './analytics.types';

/**
 * Reads detector output from the detections topic and hands each parsed
 * message to the registered frame handler.
 */
@Injectable()
export class KafkaConsumerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(KafkaConsumerService.name);
  private kafka: Kafka;
  private consumer: Consumer;
  private isRunning = false;
  private handler: DetectionFrameHandler | null = null;
  private retryTimer: NodeJS.Timeout | null = null;

  constructor(private readonly configService: ConfigService) {
    const broker = this.configService.get<string>('kafka.broker') || 'localhost:9092';
    const clientId = this.configService.get<string>('kafka.clientId') || 'footfall-consumer';
    const connectionTimeout = this.configService.get<number>('kafka.connectionTimeout', 3000);
    const requestTimeout = this.configService.get<number>('kafka.requestTimeout', 30000);

    this.kafka = new Kafka({
      clientId,
      brokers: broker.split(',').map((b) => b.trim()),
      connectionTimeout,
      requestTimeout,
      logLevel: logLevel.WARN,
    });

    const groupId = this.configService.get<string>('kafka.groupId') || 'footfall-pipeline';
    this.consumer = this.kafka.consumer({ groupId });
  }

  async onModuleInit() {
    if (!this.configService.get<boolean>('kafka.enabled', true)) {
      this.logger.log('Kafka consumer disabled by configuration');
      return;
    }
    // Connect in background, don't block application startup
    this.connectWithRetry().catch((error: unknown) => {
      this.logger.warn(
        `Kafka consumer will retry connection in background: ${error instanceof Error ? error.message : error}`,
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

  /**
   * Registers the callback that receives every detection frame. Only one handler is kept.
   */
  registerHandler(handler: DetectionFrameHandler): void {
    this.handler = handler;
  }

  private async connect() {
    const broker = this.configService.get<string>('kafka.broker') || 'localhost:9092';
    try {
      await this.consumer.connect();
      this.logger.log(`Kafka consumer connected to ${broker}`);
      return true;
    } catch (error) {
      this.logger.error(
        `Failed to connect Kafka consumer to ${broker}: ${error instanceof Error ? error.message : error}`,
      );
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
        await this.subscribe();
        await this.consume();
        return;
      }

      if (attempt < maxRetries - 1) {
        const retryTime = initialRetryTime * Math.pow(multiplier, attempt);
        this.logger.warn(
          `Kafka consumer connection failed. Retrying in ${retryTime}ms (attempt ${attempt + 1}/${maxRetries})`,
        );
        await new Promise((resolve) => setTimeout(resolve, retryTime));
      }
    }

    this.logger.error(
      `Kafka consumer failed to connect after ${maxRetries} attempts. Will continue retrying in background.`,
    );
    this.retryTimer = setTimeout(() => {
      this.connectWithRetry().catch((error: unknown) => {
        this.logger.error('Kafka consumer background retry failed', error);
      });
    }, 10000);
  }

  private async subscribe() {
    const topic = this.configService.get<string>('kafka.topics.detections') ?? 'footfall.detections.v1';
    try {
      // Only frames produced after we join matter for live counting
      await this.consumer.subscribe({ topics: [topic], fromBeginning: false });
      this.logger.log(`Subscribed to topic: ${topic}`);
    } catch (error) {
      this.logger.error('Failed to subscribe to topic', error);
      throw error;
    }
  }

  private async consume() {
    if (this.isRunning) {
      return;
    }

    this.isRunning = true;
    this.logger.log('Starting to consume detection frames...');

    try {
      await this.consumer.run({
        eachMessage: async (payload: EachMessagePayload) => {
          await this.handleMessage(payload);
        },
      });
    } catch (error) {
      this.logger.error('Error consuming messages', error);
      this.isRunning = false;
    }
  }

  private async handleMessage(payload: EachMessagePayload) {
    const { topic, partition, message } = payload;
    const { offset, key, value, timestamp } = message;

    const metadata: KafkaMessageMetadata = {
      topic,
      partition,
      offset,
      key: key ? key.toString() : null,
      timestamp: this.safeTimestampToString(timestamp),
    };

    if (!this.handler) {
      this.logger.warn(`No frame handler registered, skipping offset ${offset}`);
      return;
    }

    let parsed: unknown = null;
    if (value) {
      try {
        parsed = JSON.parse(value.toString());
      } catch {
        this.logger.warn(`Detection frame at offset ${offset} is not valid JSON, treating as empty`);
      }
    }

    try {
      await this.handler(parsed, metadata);
    } catch (error) {
      this.logger.error(
        `Error handling detection frame: ${error instanceof Error ? error.message : error}`,
        { topic, partition, offset },
      );
    }
  }

  /**
   * Safely convert a Kafka timestamp to ISO string.
   * Kafka sends milliseconds as a string; seconds are accepted too.
   */
  private safeTimestampToString(timestamp: string | number | null | undefined): string | null {
    if (timestamp === null || timestamp === undefined || timestamp === '') {
      return null;
    }

    const numeric = typeof timestamp === 'number' ? timestamp : Number(timestamp);
    if (Number.isFinite(numeric)) {
      const date = numeric > 1e12 ? new Date(numeric) : new Date(numeric * 1000);
      return isNaN(date.getTime()) ? null : date.toISOString();
    }

    const date = new Date(timestamp);
    return isNaN(date.getTime()) ? null : date.toISOString();
  }

  private async disconnect() {
    try {
      if (this.isRunning) {
        await this.consumer.disconnect();
        this.isRunning = false;
        this.logger.log('Kafka consumer disconnected');
      }
    } catch (error) {
      this.logger.error('Error disconnecting Kafka consumer', error);
    }
  }
}
