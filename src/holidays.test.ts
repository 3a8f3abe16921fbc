import { describe, expect, it } from 'vitest';
import {
  HOLIDAY_CHONGYANG,
  HOLIDAY_DONGZHI,
  HOLIDAY_DRAGON_BOAT,
  HOLIDAY_LABA,
  HOLIDAY_LANTERN,
  HOLIDAY_LONGTAITOU,
  HOLIDAY_MID_AUTUMN,
  HOLIDAY_NATIONAL_DAY,
  HOLIDAY_QINGMING,
  HOLIDAY_QIXI,
  HOLIDAY_SPRING_EVE,
  HOLIDAY_SPRING_FESTIVAL,
  HOLIDAY_ZHONGYUAN,
  holidayCategoryLabel,
  holidayFor,
} from './holidays.js';
import { solarToLunar } from './lunar.js';
import { solarTermName } from './solarTerms.js';
import type { LunarInfo, SolarDate } from './types.js';

const ORDINARY_DAY: SolarDate = { year: 2024, month: 6, day: 12 };

function lunar(month: number, day: number, festival: string | null = null, isLeap = false): LunarInfo {
  return { date: { year: 2024, month, day, isLeap }, festival };
}

function resolve(date: SolarDate) {
  return holidayFor(date, solarToLunar(date), solarTermName(date));
}

describe('holidayFor', () => {
  it('resolves fixed solar holidays regardless of lunar state', () => {
    expect(holidayFor({ year: 2023, month: 10, day: 1 }, null, null)?.name).toBe('国庆节');
    expect(holidayFor({ year: 2023, month: 10, day: 1 }, lunar(8, 15, '中秋节'), '清明')).toBe(HOLIDAY_NATIONAL_DAY);
    expect(holidayFor({ year: 1850, month: 1, day: 1 }, null, null)?.name).toBe('元旦');
    expect(holidayFor({ year: 2024, month: 5, day: 1 }, lunar(1, 1, '春节'), null)?.name).toBe('劳动节');
  });

  it('ranks Qingming above lunar holidays', () => {
    expect(holidayFor(ORDINARY_DAY, lunar(2, 2, '龙抬头'), '清明')).toBe(HOLIDAY_QINGMING);
  });

  it('resolves New Year\'s Eve from the lunar festival tag', () => {
    expect(holidayFor(ORDINARY_DAY, lunar(12, 29, '除夕'), null)).toBe(HOLIDAY_SPRING_EVE);
    expect(holidayFor(ORDINARY_DAY, lunar(12, 8, '除夕'), '冬至')).toBe(HOLIDAY_SPRING_EVE);
  });

  it('covers the first three days of the lunar year as Spring Festival', () => {
    expect(holidayFor(ORDINARY_DAY, lunar(1, 1, '春节'), null)).toBe(HOLIDAY_SPRING_FESTIVAL);
    expect(holidayFor(ORDINARY_DAY, lunar(1, 2), null)).toBe(HOLIDAY_SPRING_FESTIVAL);
    expect(holidayFor(ORDINARY_DAY, lunar(1, 3), null)).toBe(HOLIDAY_SPRING_FESTIVAL);
    expect(holidayFor(ORDINARY_DAY, lunar(1, 4), null)).toBeNull();
  });

  it('resolves the lunar statutory holidays', () => {
    expect(holidayFor(ORDINARY_DAY, lunar(5, 5, '端午节'), null)).toBe(HOLIDAY_DRAGON_BOAT);
    expect(holidayFor(ORDINARY_DAY, lunar(8, 15, '中秋节'), null)).toBe(HOLIDAY_MID_AUTUMN);
  });

  it('resolves the major traditional holidays', () => {
    expect(holidayFor(ORDINARY_DAY, lunar(1, 15), null)).toBe(HOLIDAY_LANTERN);
    expect(holidayFor(ORDINARY_DAY, lunar(7, 7), null)).toBe(HOLIDAY_QIXI);
    expect(holidayFor(ORDINARY_DAY, lunar(9, 9), null)).toBe(HOLIDAY_CHONGYANG);
  });

  it('resolves folk holidays before the winter solstice', () => {
    expect(holidayFor(ORDINARY_DAY, lunar(2, 2), null)).toBe(HOLIDAY_LONGTAITOU);
    expect(holidayFor(ORDINARY_DAY, lunar(7, 15), null)).toBe(HOLIDAY_ZHONGYUAN);
    expect(holidayFor(ORDINARY_DAY, lunar(12, 8), '冬至')).toBe(HOLIDAY_LABA);
    expect(holidayFor(ORDINARY_DAY, lunar(11, 10), '冬至')).toBe(HOLIDAY_DONGZHI);
    expect(holidayFor(ORDINARY_DAY, null, '冬至')).toBe(HOLIDAY_DONGZHI);
  });

  it('returns null when nothing matches', () => {
    expect(holidayFor(ORDINARY_DAY, null, null)).toBeNull();
    expect(holidayFor(ORDINARY_DAY, lunar(3, 3), '谷雨')).toBeNull();
  });
});

describe('holidayFor with computed calendar data', () => {
  it('labels real dates', () => {
    expect(resolve({ year: 2024, month: 2, day: 9 })?.name).toBe('除夕');
    expect(resolve({ year: 2024, month: 2, day: 10 })?.name).toBe('春节');
    expect(resolve({ year: 2024, month: 2, day: 12 })?.name).toBe('春节');
    expect(resolve({ year: 2024, month: 2, day: 24 })?.name).toBe('元宵节');
    expect(resolve({ year: 2024, month: 4, day: 4 })?.name).toBe('清明节');
    expect(resolve({ year: 2024, month: 9, day: 17 })?.name).toBe('中秋节');
    expect(resolve({ year: 2024, month: 12, day: 21 })?.name).toBe('冬至');
    expect(resolve({ year: 2025, month: 1, day: 7 })?.name).toBe('腊八节');
    expect(resolve({ year: 2025, month: 1, day: 1 })?.name).toBe('元旦');
    expect(resolve({ year: 2024, month: 6, day: 12 })).toBeNull();
  });
});

describe('holidayCategoryLabel', () => {
  it('labels each category', () => {
    expect(holidayCategoryLabel('Statutory')).toBe('法定节假日');
    expect(holidayCategoryLabel('Traditional')).toBe('传统节日');
    expect(holidayCategoryLabel('OtherTraditional')).toBe('民俗节日');
  });
});
