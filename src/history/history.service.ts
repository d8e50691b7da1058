import { BadRequestException, Injectable, Logger, ServiceUnavailableException } from '@nestjs/common';
import { DailyStats, ElasticService, HourlyStats } from '../../libs/common/src/elastic/elastic.service';
import { AnalyticsSnapshotDocument } from '../../libs/common/src/kafka/analytics.types';

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const DEFAULT_DAILY_SPAN = 7;
const MAX_DAILY_SPAN = 366;

export const CSV_HEADER = 'Timestamp,Current Count,Total Entries,Total Exits,Unique Visitors,FPS';

function parseDate(value: string, name: string): Date {
  const date = new Date(value);
  if (isNaN(date.getTime())) {
    throw new BadRequestException(`Query parameter ${name} must be an ISO-8601 date`);
  }
  return date;
}

function parseDay(value: string, name: string): Date {
  const date = new Date(`${value}T00:00:00.000Z`);
  if (!DATE_PATTERN.test(value) || isNaN(date.getTime())) {
    throw new BadRequestException(`Query parameter ${name} must be YYYY-MM-DD`);
  }
  return date;
}

function dayOf(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** `2024-05-01T10:00:00.000Z` -> `2024-05-01 10:00:00` (UTC). */
function csvTimestamp(iso: string): string {
  return iso.replace('T', ' ').slice(0, 19);
}

@Injectable()
export class HistoryService {
  private readonly logger = new Logger(HistoryService.name);

  constructor(private readonly elasticService: ElasticService) {}

  /** Snapshots in `[from, to)`; defaults to the last 24 hours. */
  async getHistory(from?: string, to?: string, now = new Date()): Promise<AnalyticsSnapshotDocument[]> {
    const end = to ? parseDate(to, 'to') : now;
    const start = from ? parseDate(from, 'from') : new Date(end.getTime() - DAY_MS);
    if (start.getTime() >= end.getTime()) {
      throw new BadRequestException('Query parameter from must be before to');
    }
    this.requireStorage();
    return this.elasticService.getHistory(start, end);
  }

  /** Hourly aggregates for one UTC day, today when no date is given. */
  async getHourlyStats(date?: string, now = new Date()): Promise<HourlyStats[]> {
    const day = date ?? dayOf(now);
    parseDay(day, 'date');
    this.requireStorage();
    return this.elasticService.getHourlyStats(day);
  }

  /** Daily rollups for `[from, to]` (UTC days); defaults to the last 7 days including today. */
  async getDailyStats(from?: string, to?: string, now = new Date()): Promise<DailyStats[]> {
    const last = to ?? dayOf(now);
    const lastDay = parseDay(last, 'to');
    const first = from ?? dayOf(new Date(lastDay.getTime() - (DEFAULT_DAILY_SPAN - 1) * DAY_MS));
    const span = (lastDay.getTime() - parseDay(first, 'from').getTime()) / DAY_MS + 1;
    if (span < 1) {
      throw new BadRequestException('Query parameter from must not be after to');
    }
    if (span > MAX_DAILY_SPAN) {
      throw new BadRequestException(`At most ${MAX_DAILY_SPAN} days can be requested at once`);
    }
    this.requireStorage();
    return this.elasticService.getDailyStats(first, last);
  }

  async exportCsv(now = new Date()): Promise<string> {
    this.requireStorage();
    const snapshots = await this.elasticService.getHistory(new Date(now.getTime() - DAY_MS), now);
    this.logger.log(`Exporting ${snapshots.length} snapshot(s) as CSV`);

    const rows = snapshots.map((s) =>
      [csvTimestamp(s.timestamp), s.current_count, s.total_entries, s.total_exits, s.unique_visitors, s.fps].join(','),
    );
    return [CSV_HEADER, ...rows].map((line) => `${line}\n`).join('');
  }

  private requireStorage(): void {
    if (!this.elasticService.isEnabled()) {
      throw new ServiceUnavailableException('Snapshot history is unavailable: Elasticsearch is disabled');
    }
  }
}
