import { Injectable, Logger } from '@nestjs/common';
import csv from 'csv-parser';
import { Readable } from 'stream';
import { ElasticService } from '../../libs/common/src/elastic/elastic.service';
import { AnalyticsSnapshotDocument } from '../../libs/common/src/kafka/analytics.types';
import { PipelineService } from '../pipeline/pipeline.service';
import { RawDetection } from '../pipeline/pipeline.types';
import { toSnapshotDocument } from '../pipeline/snapshot';

export interface ReplayResult {
  frames: number;
  processed: number;
  dropped: number;
  failed: number;
  skippedRows: number;
  indexed: number;
}

interface ReplayFrame {
  width: number;
  height: number;
  detections: RawDetection[];
}

const REQUIRED_COLUMNS = ['frame', 'left', 'top', 'right', 'bottom', 'confidence'] as const;

function numeric(row: Record<string, string>, column: string): number | undefined {
  const raw = row[column];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Replays recorded detections through the pipeline. Rows are grouped by their
 * `frame` column in first-seen order and submitted one frame at a time.
 */
@Injectable()
export class ReplayService {
  private readonly logger = new Logger(ReplayService.name);

  constructor(
    private readonly pipelineService: PipelineService,
    private readonly elasticService: ElasticService,
  ) {}

  async replayCsv(content: Buffer | string): Promise<ReplayResult> {
    const rows = await this.parse(content);
    const { frames, skippedRows } = this.groupFrames(rows);
    this.logger.log(`Replaying ${frames.length} frame(s) from ${rows.length} row(s)`);

    const result: ReplayResult = { frames: frames.length, processed: 0, dropped: 0, failed: 0, skippedRows, indexed: 0 };
    const documents: AnalyticsSnapshotDocument[] = [];

    for (const frame of frames) {
      const outcome = await this.pipelineService.submitFrame(frame);
      result[outcome]++;
      if (outcome === 'processed') {
        documents.push(toSnapshotDocument(this.pipelineService.getSnapshot()));
      }
    }

    if (documents.length > 0 && this.elasticService.isEnabled()) {
      try {
        await this.elasticService.bulkIndexSnapshots(documents);
        result.indexed = documents.length;
      } catch (error) {
        this.logger.error(`Replay snapshots could not be indexed: ${error instanceof Error ? error.message : error}`);
      }
    }

    this.logger.log(
      `Replay finished: ${result.processed} processed, ${result.dropped} dropped, ${result.failed} failed`,
    );
    return result;
  }

  private parse(content: Buffer | string): Promise<Record<string, string>[]> {
    const rows: Record<string, string>[] = [];
    return new Promise((resolve, reject) => {
      Readable.from([content])
        .pipe(csv({ mapHeaders: ({ header }) => header.trim() }))
        .on('data', (row: Record<string, string>) => rows.push(row))
        .on('end', () => resolve(rows))
        .on('error', reject);
    });
  }

  private groupFrames(rows: Record<string, string>[]): { frames: ReplayFrame[]; skippedRows: number } {
    const frames = new Map<string, ReplayFrame>();
    let skippedRows = 0;

    for (const row of rows) {
      const key = row.frame?.trim();
      const [left, top, right, bottom, confidence] = REQUIRED_COLUMNS.slice(1).map((column) => numeric(row, column));
      if (
        !key ||
        left === undefined ||
        top === undefined ||
        right === undefined ||
        bottom === undefined ||
        confidence === undefined
      ) {
        skippedRows++;
        continue;
      }

      let frame = frames.get(key);
      if (!frame) {
        frame = { width: numeric(row, 'width') ?? 0, height: numeric(row, 'height') ?? 0, detections: [] };
        frames.set(key, frame);
      }
      frame.detections.push({ left, top, right, bottom, confidence, classId: numeric(row, 'class_id') ?? 0 });
    }

    if (skippedRows > 0) {
      this.logger.warn(`Skipped ${skippedRows} malformed replay row(s)`);
    }
    return { frames: Array.from(frames.values()), skippedRows };
  }
}
