import { Injectable, Logger, NotFoundException, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import * as fs from 'fs';
import * as path from 'path';
import { CountingLine, DEFAULT_COUNTING_LINE, DEFAULT_ZONE, Zone, ZoneType } from '../analysis/analysis.types';
import { CalibrationState, PipelineThresholds } from './calibration.types';
import { CalibrationFileDto, CountingLineDto, SettingsDto, ZoneDto } from './dto';

const DEFAULT_ZONE_CAPACITY = 50;

function freezeZone(zone: Zone): Readonly<Zone> {
  return Object.freeze({ ...zone, points: Object.freeze(zone.points.map((p) => Object.freeze({ ...p }))) });
}

function toZone(dto: ZoneDto): Zone {
  return {
    id: dto.id,
    name: dto.name,
    points: dto.points.map((p) => ({ x: p.x, y: p.y })),
    capacity: dto.capacity ?? DEFAULT_ZONE_CAPACITY,
    type: dto.type ?? ZoneType.Counting,
  };
}

function toLine(dto: CountingLineDto): CountingLine {
  return { startX: dto.startX, startY: dto.startY, endX: dto.endX, endY: dto.endY };
}

function definedOnly(settings: SettingsDto): Partial<PipelineThresholds> {
  const out: Partial<PipelineThresholds> = {};
  if (settings.trackThresh !== undefined) out.trackThresh = settings.trackThresh;
  if (settings.matchThresh !== undefined) out.matchThresh = settings.matchThresh;
  if (settings.trackBuffer !== undefined) out.trackBuffer = settings.trackBuffer;
  if (settings.crowdModeThreshold !== undefined) out.crowdModeThreshold = settings.crowdModeThreshold;
  if (settings.highDensityThreshold !== undefined) out.highDensityThreshold = settings.highDensityThreshold;
  return out;
}

/**
 * Zones, counting line and thresholds. Seeded from configuration and the
 * calibration file; optionally written back to that file on every change.
 *
 * `current()` is safe to call at any time and returns a frozen state; every
 * change swaps in a new state object.
 */
@Injectable()
export class CalibrationService implements OnModuleInit {
  private readonly logger = new Logger(CalibrationService.name);
  private state: CalibrationState;
  private readonly filePath: string;
  private readonly persist: boolean;

  constructor(private readonly configService: ConfigService) {
    this.filePath = path.resolve(
      process.cwd(),
      this.configService.get<string>('calibration.file') || 'config/calibration.json',
    );
    this.persist = this.configService.get<boolean>('calibration.persist', false);
    this.state = this.freeze({
      zones: [{ ...DEFAULT_ZONE, points: DEFAULT_ZONE.points.map((p) => ({ ...p })) }],
      countingLine: { ...DEFAULT_COUNTING_LINE },
      thresholds: {
        trackThresh: this.configService.get<number>('pipeline.trackThresh', 0.5),
        matchThresh: this.configService.get<number>('pipeline.matchThresh', 0.8),
        trackBuffer: this.configService.get<number>('pipeline.trackBuffer', 30),
        crowdModeThreshold: this.configService.get<number>('pipeline.crowdModeThreshold', 20),
        highDensityThreshold: this.configService.get<number>('pipeline.highDensityThreshold', 0.7),
      },
    });
  }

  async onModuleInit() {
    await this.loadFromFile();
  }

  current(): CalibrationState {
    return this.state;
  }

  getZones(): readonly Readonly<Zone>[] {
    return this.state.zones;
  }

  getCountingLine(): Readonly<CountingLine> {
    return this.state.countingLine;
  }

  getThresholds(): Readonly<PipelineThresholds> {
    return this.state.thresholds;
  }

  /** Adds the zone, or replaces the one with the same id in place. */
  async upsertZone(dto: ZoneDto): Promise<Readonly<Zone>> {
    const zone = toZone(dto);
    const index = this.state.zones.findIndex((z) => z.id === zone.id);
    const zones = index >= 0 ? this.state.zones.map((z, i) => (i === index ? zone : z)) : [...this.state.zones, zone];
    this.state = this.freeze({ ...this.state, zones });
    this.logger.log(`Zone '${zone.id}' ${index >= 0 ? 'updated' : 'added'}`);
    await this.save();
    return this.zoneById(zone.id);
  }

  async deleteZone(id: string): Promise<void> {
    if (!this.state.zones.some((z) => z.id === id)) {
      throw new NotFoundException(`Zone '${id}' not found`);
    }
    this.state = this.freeze({ ...this.state, zones: this.state.zones.filter((z) => z.id !== id) });
    this.logger.log(`Zone '${id}' deleted`);
    await this.save();
  }

  async setCountingLine(dto: CountingLineDto): Promise<Readonly<CountingLine>> {
    this.state = this.freeze({ ...this.state, countingLine: toLine(dto) });
    this.logger.log(`Counting line set to (${dto.startX},${dto.startY})-(${dto.endX},${dto.endY})`);
    await this.save();
    return this.state.countingLine;
  }

  async updateThresholds(dto: SettingsDto): Promise<Readonly<PipelineThresholds>> {
    this.state = this.freeze({ ...this.state, thresholds: { ...this.state.thresholds, ...definedOnly(dto) } });
    this.logger.log(`Thresholds updated: ${JSON.stringify(this.state.thresholds)}`);
    await this.save();
    return this.state.thresholds;
  }

  private zoneById(id: string): Readonly<Zone> {
    const zone = this.state.zones.find((z) => z.id === id);
    if (!zone) {
      throw new NotFoundException(`Zone '${id}' not found`);
    }
    return zone;
  }

  private freeze(state: {
    zones: readonly Zone[];
    countingLine: CountingLine;
    thresholds: PipelineThresholds;
  }): CalibrationState {
    return Object.freeze({
      zones: Object.freeze(state.zones.map(freezeZone)),
      countingLine: Object.isFrozen(state.countingLine) ? state.countingLine : Object.freeze({ ...state.countingLine }),
      thresholds: Object.freeze({ ...state.thresholds }),
    });
  }

  private async loadFromFile() {
    if (!fs.existsSync(this.filePath)) {
      this.logger.log(`No calibration file at ${this.filePath}, using defaults`);
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(await fs.promises.readFile(this.filePath, 'utf-8'));
    } catch (error) {
      this.logger.error(`Calibration file ${this.filePath} could not be read, using defaults`, error);
      return;
    }

    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      this.logger.error(`Calibration file ${this.filePath} does not hold a JSON object, using defaults`);
      return;
    }

    const file = plainToInstance(CalibrationFileDto, raw);
    const errors = await validate(file, { whitelist: true });
    if (errors.length > 0) {
      this.logger.error(
        `Calibration file ${this.filePath} is invalid, using defaults: ${errors.map((e) => e.toString()).join('; ')}`,
      );
      return;
    }

    this.state = this.freeze({
      zones: file.zones ? file.zones.map(toZone) : this.state.zones,
      countingLine: file.countingLine ? toLine(file.countingLine) : this.state.countingLine,
      thresholds: file.settings ? { ...this.state.thresholds, ...definedOnly(file.settings) } : this.state.thresholds,
    });
    this.logger.log(`Loaded ${this.state.zones.length} zone(s) from ${this.filePath}`);
  }

  private async save() {
    if (!this.persist) {
      return;
    }
    const body = {
      zones: this.state.zones,
      countingLine: this.state.countingLine,
      settings: this.state.thresholds,
    };
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(this.filePath, `${JSON.stringify(body, null, 2)}\n`, 'utf-8');
      this.logger.debug(`Calibration written to ${this.filePath}`);
    } catch (error) {
      this.logger.error(`Failed to write calibration to ${this.filePath}`, error);
    }
  }
}
