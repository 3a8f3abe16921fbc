/**
 * 农历传统节日（以非闰月的月、日对应）
 */
export interface LunarFestival {
  month: number;
  day: number;
  name: string;
}

export const NEW_YEARS_EVE = '除夕';

export const LUNAR_FESTIVALS: readonly LunarFestival[] = [
  { month: 1, day: 1, name: '春节' },
  { month: 1, day: 15, name: '元宵节' },
  { month: 2, day: 2, name: '龙抬头' },
  { month: 5, day: 5, name: '端午节' },
  { month: 7, day: 7, name: '七夕节' },
  { month: 7, day: 15, name: '中元节' },
  { month: 8, day: 15, name: '中秋节' },
  { month: 9, day: 9, name: '重阳节' },
  { month: 12, day: 8, name: '腊八节' },
  { month: 12, day: 23, name: '小年' },
];

/**
 * 查找农历节日，没有则返回 null
 */
export function lunarFestival(month: number, day: number): string | null {
  const festival = LUNAR_FESTIVALS.find(f => f.month === month && f.day === day);
  return festival ? festival.name : null;
}
