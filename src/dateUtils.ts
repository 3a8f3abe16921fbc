import type { SolarDate } from './types.js';

const MS_PER_DAY = 86_400_000;

/**
 * 公历日期转为自 1970-01-01 起算的日数（UTC，不受夏令时影响）
 */
export function toDayNumber(date: SolarDate): number {
  const instant = new Date(0);
  // setUTCFullYear 不会把 0-99 年映射到 1900 年代
  instant.setUTCFullYear(date.year, date.month - 1, date.day);
  return Math.floor(instant.getTime() / MS_PER_DAY);
}

/**
 * 取 UTC 时间戳所在的公历日期（舍去时分秒）
 */
export function fromInstant(ms: number): SolarDate {
  const instant = new Date(ms);
  return {
    year: instant.getUTCFullYear(),
    month: instant.getUTCMonth() + 1,
    day: instant.getUTCDate(),
  };
}

/**
 * toDayNumber 的反向转换
 */
export function fromDayNumber(dayNumber: number): SolarDate {
  return fromInstant(dayNumber * MS_PER_DAY);
}

/**
 * 取本地时区下的公历日期，例如「今天」
 */
export function fromLocalDate(date: Date): SolarDate {
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
  };
}

/**
 * 加减天数，可跨月跨年
 */
export function addDays(date: SolarDate, days: number): SolarDate {
  return fromDayNumber(toDayNumber(date) + days);
}

/**
 * 两个日期相差的天数（to - from）
 */
export function daysBetween(from: SolarDate, to: SolarDate): number {
  return toDayNumber(to) - toDayNumber(from);
}

export function compareDates(a: SolarDate, b: SolarDate): number {
  return toDayNumber(a) - toDayNumber(b);
}

export function isSameDate(a: SolarDate, b: SolarDate): boolean {
  return a.year === b.year && a.month === b.month && a.day === b.day;
}

/** 公历某月天数，含闰年二月 */
export function daysInMonth(year: number, month: number): number {
  const first = toDayNumber({ year, month, day: 1 });
  const next = month === 12 ? toDayNumber({ year: year + 1, month: 1, day: 1 }) : toDayNumber({ year, month: month + 1, day: 1 });
  return next - first;
}

export function isValidDate(date: SolarDate): boolean {
  if (!Number.isInteger(date.year) || !Number.isInteger(date.month) || !Number.isInteger(date.day)) {
    return false;
  }
  if (date.month < 1 || date.month > 12 || date.day < 1) {
    return false;
  }
  return date.day <= daysInMonth(date.year, date.month);
}

/**
 * 星期几（0=Sunday, 6=Saturday）
 */
export function weekdayOf(date: SolarDate): number {
  // 1970-01-01 为星期四
  return (((toDayNumber(date) + 4) % 7) + 7) % 7;
}

/**
 * 判断日期是否为周末（六日）
 */
export function isWeekendDay(date: SolarDate): boolean {
  const dayOfWeek = weekdayOf(date);
  return dayOfWeek === 0 || dayOfWeek === 6;
}

/**
 * 格式化为 YYYY-MM-DD
 */
export function formatDate(date: SolarDate): string {
  const year = date.year.toString().padStart(4, '0');
  const month = date.month.toString().padStart(2, '0');
  const day = date.day.toString().padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * 解析日期字符串，支持 YYYYMMDD、YYYY-MM-DD 与 YYYY/MM/DD
 */
export function parseSolarDate(input: string): SolarDate | null {
  const value = input.trim();
  let parts: string[];

  if (/^\d{8}$/.test(value)) {
    parts = [value.substring(0, 4), value.substring(4, 6), value.substring(6, 8)];
  } else {
    const match = value.match(/^(\d{4})[-/](\d{1,2})[-/](\d{1,2})$/);
    if (!match) {
      return null;
    }
    parts = [match[1], match[2], match[3]];
  }

  const date: SolarDate = {
    year: parseInt(parts[0], 10),
    month: parseInt(parts[1], 10),
    day: parseInt(parts[2], 10),
  };
  return isValidDate(date) ? date : null;
}
