import { NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ZoneType } from '../analysis/analysis.types';
import { CalibrationService } from './calibration.service';

function configWith(values: Record<string, unknown>): ConfigService {
  return new ConfigService(values);
}

describe('CalibrationService', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'calibration-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function serviceFor(file: string, persist = false, pipeline: Record<string, number> = {}) {
    return new CalibrationService(configWith({ calibration: { file: path.join(dir, file), persist }, pipeline }));
  }

  it('starts from the default zone, line and configured thresholds', async () => {
    const service = serviceFor('missing.json', false, { crowdModeThreshold: 12 });
    await service.onModuleInit();

    expect(service.getZones().map((z) => z.id)).toEqual(['default']);
    expect(service.getCountingLine()).toEqual({ startX: 0, startY: 540, endX: 1920, endY: 540 });
    expect(service.getThresholds()).toEqual({
      trackThresh: 0.5,
      matchThresh: 0.8,
      trackBuffer: 30,
      crowdModeThreshold: 12,
      highDensityThreshold: 0.7,
    });
  });

  it('loads zones, line and settings from the calibration file', async () => {
    fs.writeFileSync(
      path.join(dir, 'calibration.json'),
      JSON.stringify({
        zones: [
          {
            id: 'door',
            name: 'Door',
            points: [
              { x: 0, y: 0 },
              { x: 10, y: 0 },
              { x: 10, y: 10 },
            ],
          },
        ],
        countingLine: { startX: 0, startY: 300, endX: 640, endY: 300 },
        settings: { trackBuffer: 10 },
      }),
    );
    const service = serviceFor('calibration.json');
    await service.onModuleInit();

    expect(service.getZones()).toEqual([
      {
        id: 'door',
        name: 'Door',
        points: [
          { x: 0, y: 0 },
          { x: 10, y: 0 },
          { x: 10, y: 10 },
        ],
        capacity: 50,
        type: ZoneType.Counting,
      },
    ]);
    expect(service.getCountingLine().startY).toBe(300);
    expect(service.getThresholds().trackBuffer).toBe(10);
    expect(service.getThresholds().trackThresh).toBe(0.5);
  });

  it('keeps the defaults when the file is invalid', async () => {
    fs.writeFileSync(path.join(dir, 'bad.json'), JSON.stringify({ zones: [{ id: 'x', name: 'X', points: [] }] }));
    const service = serviceFor('bad.json');
    await service.onModuleInit();

    expect(service.getZones().map((z) => z.id)).toEqual(['default']);
  });

  it.each([['null'], ['[]'], ['42']])('keeps the defaults when the file holds %s', async (content) => {
    fs.writeFileSync(path.join(dir, 'not-an-object.json'), content);
    const service = serviceFor('not-an-object.json');

    await expect(service.onModuleInit()).resolves.toBeUndefined();
    expect(service.getZones().map((z) => z.id)).toEqual(['default']);
  });

  it('replaces a zone with the same id in place', async () => {
    const service = serviceFor('missing.json');
    const points = [
      { x: 0, y: 0 },
      { x: 5, y: 0 },
      { x: 5, y: 5 },
    ];

    await service.upsertZone({ id: 'a', name: 'A', points });
    await service.upsertZone({ id: 'default', name: 'Renamed', points, capacity: 0, type: ZoneType.Exclusion });

    expect(service.getZones().map((z) => [z.id, z.name, z.capacity])).toEqual([
      ['default', 'Renamed', 0],
      ['a', 'A', 50],
    ]);
  });

  it('rejects deleting an unknown zone', async () => {
    const service = serviceFor('missing.json');
    await expect(service.deleteZone('nope')).rejects.toBeInstanceOf(NotFoundException);
  });

  it('swaps in a new line object on every change', async () => {
    const service = serviceFor('missing.json');
    const before = service.current();

    await service.setCountingLine({ startX: 0, startY: 100, endX: 100, endY: 100 });

    expect(service.current()).not.toBe(before);
    expect(service.current().countingLine).not.toBe(before.countingLine);
    expect(before.countingLine.startY).toBe(540);
    expect(Object.isFrozen(service.current().countingLine)).toBe(true);
  });

  it('merges partial threshold updates', async () => {
    const service = serviceFor('missing.json');
    const updated = await service.updateThresholds({ matchThresh: 0.6 });

    expect(updated.matchThresh).toBe(0.6);
    expect(updated.trackThresh).toBe(0.5);
  });

  it('writes changes back when persistence is on', async () => {
    const service = serviceFor('nested/out.json', true);
    await service.deleteZone('default');

    const written = JSON.parse(fs.readFileSync(path.join(dir, 'nested/out.json'), 'utf-8'));
    expect(written.zones).toEqual([]);
    expect(written.countingLine).toEqual({ startX: 0, startY: 540, endX: 1920, endY: 540 });

    const reloaded = serviceFor('nested/out.json');
    await reloaded.onModuleInit();
    expect(reloaded.getZones()).toEqual([]);
  });
});
