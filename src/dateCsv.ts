import { parse } from 'csv-parse/sync';
import { parseSolarDate } from './dateUtils.js';
import { debug } from './logger.js';
import type { SolarDate } from './types.js';

/** 可接受的日期列名，依次尝试 */
const DATE_COLUMNS = ['公历日期', '日期', 'date', 'Date'];

export interface DateCsvResult {
  dates: SolarDate[];
  skipped: number; // 缺少日期或日期格式错误的行数
}

function dateColumnValue(record: unknown): string | null {
  if (typeof record !== 'object' || record === null) {
    return null;
  }
  const entries: [string, unknown][] = Object.entries(record);
  for (const name of DATE_COLUMNS) {
    const entry = entries.find(([key]) => key === name);
    if (entry && typeof entry[1] === 'string' && entry[1] !== '') {
      return entry[1];
    }
  }
  return null;
}

/**
 * 解析含日期列的 CSV（第一行为标题），日期格式同 parseSolarDate
 */
export function parseDateCSV(csvContent: string): DateCsvResult {
  const records: unknown = parse(csvContent, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true,
  });

  if (!Array.isArray(records)) {
    throw new Error('Date CSV did not produce a list of records');
  }

  const dates: SolarDate[] = [];
  let skipped = 0;
  records.forEach((record: unknown, index: number) => {
    const value = dateColumnValue(record);
    const date = value === null ? null : parseSolarDate(value);
    if (!date) {
      skipped++;
      debug(`Skipped row ${index + 1} - invalid date: ${value ?? '(missing)'}`);
      return;
    }
    dates.push(date);
  });

  debug(`Parsed ${dates.length} dates, skipped ${skipped} rows`);
  return { dates, skipped };
}
