import * as fs from 'fs/promises';
import { describeDay, formatDayDetails } from './calendar.js';
import { parseDateCSV } from './dateCsv.js';
import { fromLocalDate, parseSolarDate } from './dateUtils.js';
import { debug } from './logger.js';
import type { SolarDate } from './types.js';

function printDetails(date: SolarDate): void {
  const day = describeDay(date);
  debug('Day record:', day);
  for (const line of formatDayDetails(day)) {
    console.log(line);
  }
}

/**
 * 查询单日农历、节气与节日；参数为 .csv 文件时逐行查询，未指定时查询今天
 */
async function main() {
  const arg = process.argv[2];

  if (arg && arg.toLowerCase().endsWith('.csv')) {
    const { dates, skipped } = parseDateCSV(await fs.readFile(arg, 'utf-8'));
    dates.forEach((date, index) => {
      if (index > 0) console.log('');
      printDetails(date);
    });
    if (skipped > 0) {
      console.error(`Skipped ${skipped} rows without a valid date`);
    }
    return;
  }

  const date = arg ? parseSolarDate(arg) : fromLocalDate(new Date());
  if (!date) {
    throw new Error(`Invalid date: "${arg}" (expected YYYY-MM-DD, YYYY/MM/DD or YYYYMMDD)`);
  }
  printDetails(date);
}

main().catch((error: unknown) => {
  console.error('❌ Lookup failed:', error);
  process.exit(1);
});
