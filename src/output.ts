import * as fs from 'fs/promises';
import * as path from 'path';
import { debug } from './logger.js';
import { MIN_YEAR, maxSupportedYear } from './lunar.js';
import { SOLAR_TERM_MAX_YEAR, SOLAR_TERM_MIN_YEAR } from './solarTerms.js';
import type { CalendarData, CalendarIndex, CalendarIndexEntry, YearlyCalendarData } from './types.js';

export const YEARLY_FILE_NAME = 'all.json';
export const INDEX_FILE_NAME = 'index.json';

/**
 * 以两空格缩进写出 JSON，并创建所在目录
 */
async function writeJSONFile(filePath: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
}

function monthFileName(month: number): string {
  return `${month.toString().padStart(2, '0')}.json`;
}

/**
 * 单月文件：<outputDir>/<year>/<MM>.json
 */
export async function saveJSON(data: CalendarData, outputDir: string): Promise<string> {
  const relative = path.join(data.year.toString(), monthFileName(data.month));
  const filePath = path.join(outputDir, relative);
  await writeJSONFile(filePath, data);
  console.log(`Saved: ${relative}`);
  return filePath;
}

/**
 * 逐月写出，没有日期的月份不写，返回写出的文件数
 */
export async function saveAllMonths(monthlyData: CalendarData[], outputDir: string): Promise<number> {
  const nonEmpty = monthlyData.filter(data => data.days.length > 0);
  for (const data of nonEmpty) {
    await saveJSON(data, outputDir);
  }
  debug(`Saved ${nonEmpty.length} of ${monthlyData.length} months`);
  return nonEmpty.length;
}

/**
 * 整年文件：<outputDir>/<year>/all.json，各月保留农历标题信息
 */
export async function saveYearlyData(monthlyData: CalendarData[], outputDir: string): Promise<string | null> {
  if (monthlyData.length === 0) return null;

  const { year, generatedAt } = monthlyData[0];
  const yearlyData: YearlyCalendarData = {
    year,
    months: monthlyData.map(({ month, anchor, days }) => ({ month, anchor, days })),
    generatedAt,
  };

  const relative = path.join(year.toString(), YEARLY_FILE_NAME);
  const filePath = path.join(outputDir, relative);
  await writeJSONFile(filePath, yearlyData);
  console.log(`Saved: ${relative}`);
  return filePath;
}

function indexEntry(year: number, file: string, month: number | null): CalendarIndexEntry {
  return { year, month, file: `${year}/${file}`, url: `./${year}/${file}` };
}

/**
 * 生成 index.json 列出所有可用的月份与整年文件
 */
export async function generateIndex(outputDir: string, generatedAt: string = new Date().toISOString()): Promise<CalendarIndex> {
  const yearDirs = await fs.readdir(outputDir);
  const availableCalendars: CalendarIndexEntry[] = [];

  for (const yearDir of yearDirs) {
    const yearPath = path.join(outputDir, yearDir);
    const stats = await fs.stat(yearPath);

    // 只处理目录且为数字年份
    if (!stats.isDirectory() || !/^\d{4}$/.test(yearDir)) {
      continue;
    }

    const year = parseInt(yearDir, 10);
    const files = await fs.readdir(yearPath);

    for (const file of files.filter(name => /^\d{2}\.json$/.test(name))) {
      availableCalendars.push(indexEntry(year, file, parseInt(file, 10)));
    }
    if (files.includes(YEARLY_FILE_NAME)) {
      availableCalendars.push({ ...indexEntry(year, YEARLY_FILE_NAME, null), isYearly: true });
    }
  }

  // 按年份和月份排序（最新的在前面，整年文件排在该年各月之前）
  availableCalendars.sort((a, b) => {
    if (a.year !== b.year) return b.year - a.year;
    if (a.isYearly && !b.isYearly) return -1;
    if (!a.isYearly && b.isYearly) return 1;
    return (b.month ?? 0) - (a.month ?? 0);
  });

  const index: CalendarIndex = {
    availableCalendars,
    generatedAt,
    supportedRange: {
      lunar: { minYear: MIN_YEAR, maxYear: maxSupportedYear() },
      solarTerms: { minYear: SOLAR_TERM_MIN_YEAR, maxYear: SOLAR_TERM_MAX_YEAR },
    },
  };

  const indexPath = path.join(outputDir, INDEX_FILE_NAME);
  await writeJSONFile(indexPath, index);
  console.log(`Generated index file: ${indexPath}`);
  return index;
}
