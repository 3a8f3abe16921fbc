import { addDays, compareDates, daysInMonth, formatDate, isSameDate, isWeekendDay, weekdayOf } from './dateUtils.js';
import { holidayCategoryLabel, holidayFor } from './holidays.js';
import {
  MIN_YEAR,
  lunarDayLabel,
  lunarDisplayLabel,
  lunarMonthLabel,
  maxSupportedYear,
  solarToLunar,
  stemBranchYear,
  zodiacAnimal,
} from './lunar.js';
import { solarTermName } from './solarTerms.js';
import type { CalendarData, CalendarDay, CalendarGridCell, CalendarLunar, LunarInfo, SolarDate } from './types.js';

const WEEKDAY_NAMES = ['日', '一', '二', '三', '四', '五', '六'];

function toCalendarLunar(lunar: LunarInfo): CalendarLunar {
  return {
    year: lunar.date.year,
    month: lunar.date.month,
    day: lunar.date.day,
    isLeap: lunar.date.isLeap,
    monthLabel: lunarMonthLabel(lunar),
    dayLabel: lunarDayLabel(lunar.date.day),
    festival: lunar.festival,
    stemBranch: stemBranchYear(lunar.date.year),
    zodiac: zodiacAnimal(lunar.date.year),
  };
}

/**
 * 组合单日的农历、节气与节日信息
 */
export function describeDay(date: SolarDate): CalendarDay {
  const lunar = solarToLunar(date);
  const solarTerm = solarTermName(date);
  const holiday = holidayFor(date, lunar, solarTerm);
  const weekday = weekdayOf(date);

  // 显示优先级：节日 > 节气 > 农历日
  const label = holiday?.name ?? solarTerm ?? (lunar ? lunarDisplayLabel(lunar) : '--');

  return {
    date: formatDate(date),
    weekday,
    isWeekend: isWeekendDay(date),
    lunar: lunar ? toCalendarLunar(lunar) : null,
    solarTerm,
    holiday: holiday
      ? {
          name: holiday.name,
          category: holiday.category,
          categoryLabel: holidayCategoryLabel(holiday.category),
          note: holiday.note,
        }
      : null,
    label,
  };
}

/**
 * 当月 1 日的农历，超出范围返回 null
 */
export function monthAnchorLunar(year: number, month: number): CalendarLunar | null {
  const lunar = solarToLunar({ year, month, day: 1 });
  return lunar ? toCalendarLunar(lunar) : null;
}

/**
 * 月历：6 周 × 7 天，每周由星期一开始，前后月份的日期也会填入
 */
export function monthGrid(year: number, month: number, today: SolarDate | null = null): CalendarGridCell[][] {
  const firstDay: SolarDate = { year, month, day: 1 };
  const offset = (weekdayOf(firstDay) + 6) % 7;
  let cursor = addDays(firstDay, -offset);

  const rows: CalendarGridCell[][] = [];
  for (let week = 0; week < 6; week++) {
    const row: CalendarGridCell[] = [];
    for (let i = 0; i < 7; i++) {
      row.push({
        ...describeDay(cursor),
        isCurrentMonth: cursor.year === year && cursor.month === month,
        isToday: today !== null && isSameDate(cursor, today),
      });
      cursor = addDays(cursor, 1);
    }
    rows.push(row);
  }
  return rows;
}

export function buildMonth(year: number, month: number, generatedAt: string = new Date().toISOString()): CalendarData {
  const days: CalendarDay[] = [];
  const total = daysInMonth(year, month);
  for (let day = 1; day <= total; day++) {
    days.push(describeDay({ year, month, day }));
  }
  return { year, month, anchor: monthAnchorLunar(year, month), days, generatedAt };
}

export function buildYear(year: number, generatedAt: string = new Date().toISOString()): CalendarData[] {
  const result: CalendarData[] = [];
  for (let month = 1; month <= 12; month++) {
    result.push(buildMonth(year, month, generatedAt));
  }
  return result;
}

/**
 * 将日期限制在农历数据表支持的公历年份内
 */
export function clampToSupportedRange(date: SolarDate): SolarDate {
  const minDate: SolarDate = { year: MIN_YEAR, month: 1, day: 1 };
  const maxDate: SolarDate = { year: maxSupportedYear(), month: 12, day: 31 };
  if (compareDates(date, minDate) < 0) {
    return minDate;
  }
  if (compareDates(date, maxDate) > 0) {
    return maxDate;
  }
  return date;
}

/**
 * 单日详情文字
 */
export function formatDayDetails(day: CalendarDay): string[] {
  const holidaySuffix = day.holiday ? ` · ${day.holiday.name}` : '';
  const lines = [`当前：${day.date} (星期${WEEKDAY_NAMES[day.weekday]})${holidaySuffix}`];
  lines.push(day.solarTerm ? `节气：${day.solarTerm}` : '节气：-');
  if (day.holiday) {
    lines.push(`${day.holiday.categoryLabel}：${day.holiday.name} - ${day.holiday.note}`);
  }

  if (day.lunar) {
    lines.push(`农历：${day.lunar.stemBranch}年 ${day.lunar.monthLabel} ${day.lunar.festival ?? day.lunar.dayLabel}`);
    lines.push(`生肖：${day.lunar.zodiac}`);
    lines.push(`节日：${day.lunar.festival ?? '-'}`);
  } else {
    lines.push('农历：超出支持范围');
  }
  return lines;
}
