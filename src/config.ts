import * as path from 'path';
import { MIN_YEAR, maxSupportedYear } from './lunar.js';

export interface GenerateConfig {
  startYear: number;
  endYear: number;
  outputDir: string;
  debug: boolean;
}

/**
 * 解析年份参数，接受 "2024" 或 "2024-2026"
 */
function parseYearRange(arg: string): [number, number] {
  const match = arg.trim().match(/^(\d{4})(?:-(\d{4}))?$/);
  if (!match) {
    throw new Error(`Invalid year range: "${arg}" (expected YYYY or YYYY-YYYY)`);
  }
  const start = parseInt(match[1], 10);
  const end = match[2] ? parseInt(match[2], 10) : start;
  return [start, end];
}

function parseYear(name: string, value: string): number {
  if (!/^\d{4}$/.test(value.trim())) {
    throw new Error(`Invalid ${name}: "${value}" (expected YYYY)`);
  }
  return parseInt(value, 10);
}

/**
 * 由命令行参数与环境变量生成导出配置
 *
 * 优先顺序：命令行年份 > CALENDAR_START_YEAR / CALENDAR_END_YEAR > 今年
 */
export function loadConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  now: Date = new Date(),
): GenerateConfig {
  const currentYear = now.getFullYear();
  let startYear: number;
  let endYear: number;

  // 不接受任何选项，只接受一个年份参数
  const option = argv.find(arg => arg.startsWith('-'));
  if (option) {
    throw new Error(`Unknown option: "${option}" (expected YYYY or YYYY-YYYY)`);
  }
  if (argv.length > 1) {
    throw new Error(`Unexpected arguments: "${argv.slice(1).join(' ')}" (expected a single YYYY or YYYY-YYYY)`);
  }

  const rangeArg = argv[0];
  if (rangeArg) {
    [startYear, endYear] = parseYearRange(rangeArg);
  } else {
    startYear = env.CALENDAR_START_YEAR ? parseYear('CALENDAR_START_YEAR', env.CALENDAR_START_YEAR) : currentYear;
    endYear = env.CALENDAR_END_YEAR ? parseYear('CALENDAR_END_YEAR', env.CALENDAR_END_YEAR) : startYear;
  }

  const maxYear = maxSupportedYear();
  if (startYear < MIN_YEAR || endYear > maxYear) {
    throw new Error(`Years must be within ${MIN_YEAR}-${maxYear}, got ${startYear}-${endYear}`);
  }
  if (startYear > endYear) {
    throw new Error(`Start year ${startYear} is after end year ${endYear}`);
  }

  return {
    startYear,
    endYear,
    outputDir: env.CALENDAR_OUTPUT_DIR ? path.resolve(env.CALENDAR_OUTPUT_DIR) : path.join(process.cwd(), 'public'),
    debug: env.DEBUG === 'true',
  };
}
