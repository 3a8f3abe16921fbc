import { fromInstant, isSameDate } from './dateUtils.js';
import type { SolarDate } from './types.js';

/** 二十四节气，自小寒起依次排列 */
export const SOLAR_TERM_NAMES = [
  '小寒', '大寒', '立春', '雨水', '惊蛰', '春分', '清明', '谷雨', '立夏', '小满', '芒种', '夏至',
  '小暑', '大暑', '立秋', '处暑', '白露', '秋分', '寒露', '霜降', '立冬', '小雪', '大雪', '冬至',
] as const;

export type SolarTermName = (typeof SOLAR_TERM_NAMES)[number];

/**
 * 各节气距当年小寒的分钟数
 */
const SOLAR_TERM_OFFSETS: readonly number[] = [
  0, 21208, 42467, 63836, 85337, 107014, 128867, 150921, 173149, 195551, 218072, 240693,
  263343, 285989, 308563, 331033, 353350, 375494, 397447, 419210, 440795, 462224, 483532, 504758,
];

export const SOLAR_TERM_BASE_YEAR = 1900;
export const SOLAR_TERM_MIN_YEAR = 1900;
export const SOLAR_TERM_MAX_YEAR = 2100;

/** 平均回归年的毫秒数 */
const TROPICAL_YEAR_MS = 31_556_925_974.7;
const MS_PER_MINUTE = 60_000;

/** 1900 年小寒时刻：1900-01-06 02:05:00 */
const SOLAR_TERM_BASE_INSTANT = Date.UTC(SOLAR_TERM_BASE_YEAR, 0, 6, 2, 5, 0);

export interface SolarTermDate {
  name: SolarTermName;
  date: SolarDate;
}

function isSupportedYear(year: number): boolean {
  return Number.isInteger(year) && year >= SOLAR_TERM_MIN_YEAR && year <= SOLAR_TERM_MAX_YEAR;
}

/**
 * 以固定系数近似计算某年第 index 个节气的日期，仅在 1900-2100 年间有效
 */
export function solarTermDate(year: number, index: number): SolarDate | null {
  if (!isSupportedYear(year) || !Number.isInteger(index) || index < 0 || index >= SOLAR_TERM_OFFSETS.length) {
    return null;
  }
  const yearOffset = (year - SOLAR_TERM_BASE_YEAR) * TROPICAL_YEAR_MS;
  const termOffset = SOLAR_TERM_OFFSETS[index] * MS_PER_MINUTE;
  return fromInstant(SOLAR_TERM_BASE_INSTANT + Math.round(yearOffset + termOffset));
}

/**
 * 该日期若为节气则返回节气名称
 */
export function solarTermName(date: SolarDate): SolarTermName | null {
  if (!isSupportedYear(date.year)) {
    return null;
  }
  for (let index = 0; index < SOLAR_TERM_NAMES.length; index++) {
    const termDate = solarTermDate(date.year, index);
    if (termDate && isSameDate(termDate, date)) {
      return SOLAR_TERM_NAMES[index];
    }
  }
  return null;
}

/**
 * 列出某年全部节气日期，超出支持范围返回空数组
 */
export function solarTermsOfYear(year: number): SolarTermDate[] {
  const terms: SolarTermDate[] = [];
  SOLAR_TERM_NAMES.forEach((name, index) => {
    const date = solarTermDate(year, index);
    if (date) {
      terms.push({ name, date });
    }
  });
  return terms;
}
