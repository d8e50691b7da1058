import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { KafkaConsumerService } from '../../libs/common/src/kafka/consumer.service';
import { KafkaMessageMetadata } from '../../libs/common/src/kafka/analytics.types';
import { decodeFrameMessage } from './frame-decoder';
import { PipelineService } from './pipeline.service';

/**
 * Feeds frames from the detections topic into the pipeline.
 */
@Injectable()
export class FrameIngestService implements OnModuleInit {
  private readonly logger = new Logger(FrameIngestService.name);

  constructor(
    private readonly consumerService: KafkaConsumerService,
    private readonly pipelineService: PipelineService,
  ) {}

  onModuleInit() {
    this.consumerService.registerHandler((payload, metadata) => this.handleFrame(payload, metadata));
  }

  async handleFrame(payload: unknown, metadata: KafkaMessageMetadata): Promise<void> {
    const outcome = await this.pipelineService.submitFrame(decodeFrameMessage(payload));
    this.logger.debug(`Frame at ${metadata.topic}[${metadata.partition}]@${metadata.offset}: ${outcome}`);
  }
}
