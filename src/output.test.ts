import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { buildMonth } from './calendar.js';
import { generateIndex, saveAllMonths, saveJSON, saveYearlyData } from './output.js';
import type { CalendarData } from './types.js';

const GENERATED_AT = '2024-01-01T00:00:00.000Z';

function emptyMonth(year: number, month: number): CalendarData {
  return { year, month, anchor: null, days: [], generatedAt: GENERATED_AT };
}

async function readJSON(filePath: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(filePath, 'utf-8'));
}

describe('output', () => {
  let outputDir: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lunar-calendar-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  it('saves a month under its year directory', async () => {
    const data = buildMonth(2024, 2, GENERATED_AT);
    const filePath = await saveJSON(data, outputDir);

    expect(filePath).toBe(path.join(outputDir, '2024', '02.json'));
    expect(await readJSON(filePath)).toEqual(data);
    expect(data.days[9].label).toBe('春节');
  });

  it('skips months without days', async () => {
    const saved = await saveAllMonths([buildMonth(2024, 1, GENERATED_AT), emptyMonth(2024, 2)], outputDir);

    expect(saved).toBe(1);
    expect(await fs.readdir(path.join(outputDir, '2024'))).toEqual(['01.json']);
  });

  it('saves the whole year', async () => {
    const january = buildMonth(2024, 1, GENERATED_AT);
    const filePath = await saveYearlyData([january, emptyMonth(2024, 2)], outputDir);

    expect(filePath).toBe(path.join(outputDir, '2024', 'all.json'));
    expect(january.anchor?.stemBranch).toBe('癸卯');
    expect(await readJSON(path.join(outputDir, '2024', 'all.json'))).toEqual({
      year: 2024,
      months: [
        { month: 1, anchor: january.anchor, days: january.days },
        { month: 2, anchor: null, days: [] },
      ],
      generatedAt: GENERATED_AT,
    });
  });

  it('does nothing for an empty year', async () => {
    expect(await saveYearlyData([], outputDir)).toBeNull();
    expect(await fs.readdir(outputDir)).toEqual([]);
  });

  it('indexes yearly and monthly files, newest first', async () => {
    await saveAllMonths([buildMonth(2023, 12, GENERATED_AT)], outputDir);
    const months2024 = [buildMonth(2024, 1, GENERATED_AT), buildMonth(2024, 2, GENERATED_AT)];
    await saveAllMonths(months2024, outputDir);
    await saveYearlyData(months2024, outputDir);
    await fs.mkdir(path.join(outputDir, 'assets'));
    await fs.writeFile(path.join(outputDir, 'README.txt'), 'not a calendar', 'utf-8');

    const index = await generateIndex(outputDir, GENERATED_AT);

    expect(index.availableCalendars).toEqual([
      { year: 2024, month: null, file: '2024/all.json', url: './2024/all.json', isYearly: true },
      { year: 2024, month: 2, file: '2024/02.json', url: './2024/02.json' },
      { year: 2024, month: 1, file: '2024/01.json', url: './2024/01.json' },
      { year: 2023, month: 12, file: '2023/12.json', url: './2023/12.json' },
    ]);
    expect(index.supportedRange).toEqual({
      lunar: { minYear: 1900, maxYear: 2112 },
      solarTerms: { minYear: 1900, maxYear: 2100 },
    });

    expect(await readJSON(path.join(outputDir, 'index.json'))).toEqual(index);
  });
});
