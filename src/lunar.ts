import { addDays, daysBetween } from './dateUtils.js';
import { NEW_YEARS_EVE, lunarFestival } from './festivals.js';
import { LUNAR_INFO, MIN_YEAR, yearInfo } from './lunarTable.js';
import type { LunarDate, LunarInfo, SolarDate } from './types.js';

export { MIN_YEAR } from './lunarTable.js';

/** 1900 年正月初一对应的公历日期 */
export const LUNAR_EPOCH: SolarDate = { year: MIN_YEAR, month: 1, day: 31 };

const STEMS = ['甲', '乙', '丙', '丁', '戊', '己', '庚', '辛', '壬', '癸'] as const;
const BRANCHES = ['子', '丑', '寅', '卯', '辰', '巳', '午', '未', '申', '酉', '戌', '亥'] as const;
const ZODIAC = ['鼠', '牛', '虎', '兔', '龙', '蛇', '马', '羊', '猴', '鸡', '狗', '猪'] as const;
const MONTH_NAMES = ['正', '二', '三', '四', '五', '六', '七', '八', '九', '十', '冬', '腊'] as const;
const DAY_NAMES = [
  '初一', '初二', '初三', '初四', '初五', '初六', '初七', '初八', '初九', '初十',
  '十一', '十二', '十三', '十四', '十五', '十六', '十七', '十八', '十九', '二十',
  '廿一', '廿二', '廿三', '廿四', '廿五', '廿六', '廿七', '廿八', '廿九', '三十',
] as const;

/**
 * 农历数据表最后一年（MIN_YEAR + 表长 - 1）
 */
export function maxSupportedYear(): number {
  return MIN_YEAR + LUNAR_INFO.length - 1;
}

/**
 * 闰月月份，0 表示该年无闰月（超出范围的年份亦返回 0）
 */
export function leapMonth(year: number): number {
  return (yearInfo(year) ?? 0) & 0xf;
}

/**
 * 闰月天数，无闰月时为 0
 */
export function leapMonthDays(year: number): number {
  if (leapMonth(year) === 0) {
    return 0;
  }
  return ((yearInfo(year) ?? 0) & 0x10000) !== 0 ? 30 : 29;
}

/**
 * 非闰月的天数（29 或 30），超出范围一律视为小月
 */
export function lunarMonthDays(year: number, month: number): number {
  const info = yearInfo(year);
  if (info === null || !Number.isInteger(month) || month < 1 || month > 12) {
    return 29;
  }
  return (info & (0x10000 >> month)) !== 0 ? 30 : 29;
}

/**
 * 农历年总天数：12 个月 × 29 天，加上大月数与闰月天数
 */
export function lunarYearDays(year: number): number {
  const info = yearInfo(year) ?? 0;
  let sum = 348;
  for (let mask = 0x8000; mask > 0x8; mask >>= 1) {
    if ((info & mask) !== 0) {
      sum++;
    }
  }
  return sum + leapMonthDays(year);
}

/**
 * 公历转农历，超出农历数据表范围返回 null
 */
export function solarToLunar(date: SolarDate): LunarInfo | null {
  let offset = daysBetween(LUNAR_EPOCH, date);
  if (offset < 0) {
    return null;
  }

  const maxYear = maxSupportedYear();
  let year = MIN_YEAR;
  while (year <= maxYear) {
    const yearDays = lunarYearDays(year);
    if (offset < yearDays) {
      break;
    }
    offset -= yearDays;
    year++;
  }

  if (year > maxYear) {
    return null;
  }

  // 闰月紧接在同名的正常月份之后
  const leap = leapMonth(year);
  let month = 1;
  let isLeap = false;
  while (true) {
    const monthDays = isLeap ? leapMonthDays(year) : lunarMonthDays(year, month);
    if (offset < monthDays) {
      break;
    }
    offset -= monthDays;
    if (leap !== 0 && month === leap && !isLeap) {
      isLeap = true;
    } else {
      isLeap = false;
      month++;
    }
  }

  const day = offset + 1;
  let festival = isLeap ? null : lunarFestival(month, day);
  if (!isLeap && month === 12 && day === lunarMonthDays(year, 12)) {
    festival = NEW_YEARS_EVE;
  }

  return {
    date: { year, month, day, isLeap },
    festival,
  };
}

/**
 * 自 1900 年正月初一起算的农历日数，农历日期不存在时返回 null
 */
export function lunarDayNumber(date: LunarDate): number | null {
  const { year, month, day, isLeap } = date;
  if (!Number.isInteger(year) || year < MIN_YEAR || year > maxSupportedYear()) {
    return null;
  }
  if (!Number.isInteger(month) || month < 1 || month > 12 || !Number.isInteger(day)) {
    return null;
  }

  const leap = leapMonth(year);
  if (isLeap && leap !== month) {
    return null;
  }
  const monthDays = isLeap ? leapMonthDays(year) : lunarMonthDays(year, month);
  if (day < 1 || day > monthDays) {
    return null;
  }

  let offset = 0;
  for (let y = MIN_YEAR; y < year; y++) {
    offset += lunarYearDays(y);
  }
  for (let m = 1; m < month; m++) {
    offset += lunarMonthDays(year, m);
    if (m === leap) {
      offset += leapMonthDays(year);
    }
  }
  if (isLeap) {
    offset += lunarMonthDays(year, month);
  }
  return offset + day - 1;
}

/**
 * 农历转公历，农历日期不存在时返回 null
 */
export function lunarToSolar(date: LunarDate): SolarDate | null {
  const offset = lunarDayNumber(date);
  if (offset === null) {
    return null;
  }
  return addDays(LUNAR_EPOCH, offset);
}

/**
 * 干支纪年，例如 2024 → 甲辰
 */
export function stemBranchYear(year: number): string {
  const cycle = year - 4;
  const stem = STEMS[floorMod(cycle, 10)];
  const branch = BRANCHES[floorMod(cycle, 12)];
  return `${stem}${branch}`;
}

/**
 * 生肖，例如 2024 → 龙
 */
export function zodiacAnimal(year: number): string {
  return ZODIAC[floorMod(year - 4, 12)];
}

/**
 * 农历月名，例如「正月」「闰二月」「腊月」
 */
export function lunarMonthLabel(info: LunarInfo): string {
  const prefix = info.date.isLeap ? '闰' : '';
  const index = Math.min(Math.max(info.date.month, 1), 12) - 1;
  return `${prefix}${MONTH_NAMES[index]}月`;
}

/** 农历日名：初一至三十 */
export function lunarDayLabel(day: number): string {
  const index = Math.min(Math.max(day, 1), 30) - 1;
  return DAY_NAMES[index];
}

/**
 * 月历格子显示用：有节日显示节日，否则显示农历日
 */
export function lunarDisplayLabel(info: LunarInfo): string {
  return info.festival ?? lunarDayLabel(info.date.day);
}

function floorMod(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}
