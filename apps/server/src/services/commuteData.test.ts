import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CommuteDataService } from './commuteData.js';

const CONFIG = `
itineraries:
  - id: 2
    name: Second route
    from: Office
    to: Gym
    output_file: to-2.csv
  - id: 1
    name: First route
    from: Home
    to: Office
    output_file: to-1.csv
`;

describe('CommuteDataService', () => {
  let root: string;
  let dataDir: string;
  let configPath: string;

  beforeEach(async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    root = await mkdtemp(join(tmpdir(), 'commute-service-'));
    dataDir = join(root, 'data');
    configPath = join(root, 'config.yaml');
    await mkdir(dataDir);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  function service(): CommuteDataService {
    return new CommuteDataService({
      dataDir,
      configPath,
      loadOptions: { timeMode: { kind: 'naive' } },
    });
  }

  it('should list itineraries from file names without a config', async () => {
    await writeFile(join(dataDir, 'to.csv'), '');
    await writeFile(join(dataDir, 'from.csv'), '');
    await writeFile(join(dataDir, 'notes.txt'), 'ignored');

    const itineraries = await service().listItineraries();

    expect(itineraries.map((i) => [i.id, i.name, i.files.map((f) => f.fileName)])).toEqual([
      ['default', 'Commute', ['to.csv', 'from.csv']],
    ]);
  });

  it('should order tabs by declared id and include declared files not on disk', async () => {
    await writeFile(configPath, CONFIG);
    await writeFile(join(dataDir, 'to-2.csv'), '');
    await writeFile(join(dataDir, 'extra.csv'), '');

    const itineraries = await service().listItineraries();

    expect(itineraries.map((i) => i.name)).toEqual(['First route', 'Second route', 'Itinerary extra']);
  });

  it('should return an empty list when the data directory is missing', async () => {
    await rm(dataDir, { recursive: true });
    await expect(service().listItineraries()).resolves.toEqual([]);
  });

  it('should aggregate each file of an itinerary', async () => {
    await writeFile(
      join(dataDir, 'to.csv'),
      ['2025-01-08T08:00:00,10', '2025-01-08T08:00:00,20', '2025-01-13T08:30:00,5'].join('\n'),
    );
    await writeFile(join(dataDir, 'from.csv'), '2025-01-08T17:00:00,30\n');

    const charts = await service().getItineraryCharts('default');

    expect(charts?.panels.map((p) => [p.fileName, p.sampleCount])).toEqual([
      ['to.csv', 3],
      ['from.csv', 1],
    ]);
    const [to] = charts?.panels ?? [];
    expect(to.byTime.map((r) => [r.timeOfDay, r.commuteTime])).toEqual([
      ['08:00', 15],
      ['08:30', 5],
    ]);
    expect(to.byWeekday.map((r) => [r.weekdayLabel, r.timeOfDay, r.commuteTime])).toEqual([
      ['1 - Monday', '08:30', 5],
      ['3 - Wednesday', '08:00', 15],
    ]);
    expect(to.warning).toBeUndefined();
  });

  it('should filter samples by weekday', async () => {
    await writeFile(
      join(dataDir, 'to.csv'),
      ['2025-01-08T08:00:00,10', '2025-01-13T08:00:00,30'].join('\n'),
    );

    const charts = await service().getItineraryCharts('default', [1]);

    expect(charts?.weekdays).toEqual([1]);
    expect(charts?.panels[0].byTime).toEqual([
      { timeOfDay: '08:00', commuteTime: 30, stdDev: undefined, count: 1 },
    ]);
  });

  it('should warn about a declared file that does not exist', async () => {
    await writeFile(configPath, CONFIG);

    const charts = await service().getItineraryCharts('1');

    expect(charts?.panels).toEqual([
      {
        fileName: 'to-1.csv',
        direction: 'to',
        title: 'Home → Office',
        sampleCount: 0,
        byTime: [],
        byWeekday: [],
        warning: { kind: 'not-found', message: 'Data file to-1.csv not found' },
      },
    ]);
  });

  it('should isolate a malformed file from its sibling', async () => {
    await writeFile(join(dataDir, 'to.csv'), '2025-01-08T08:00:00,late\n');
    await writeFile(join(dataDir, 'from.csv'), '2025-01-08T17:00:00,30\n');

    const charts = await service().getItineraryCharts('default');

    const [to, from] = charts?.panels ?? [];
    expect(to.sampleCount).toBe(0);
    expect(to.warning).toEqual({
      kind: 'unavailable',
      message: "Cannot read to.csv: row 1: commute_time 'late' is not a number",
    });
    expect(from.sampleCount).toBe(1);
    expect(from.warning).toBeUndefined();
  });

  it('should return undefined for an unknown itinerary', async () => {
    await expect(service().getItineraryCharts('nope')).resolves.toBeUndefined();
  });
});
