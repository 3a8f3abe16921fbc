import { NEW_YEARS_EVE } from './festivals.js';
import type { HolidayCategory, HolidayInfo, LunarInfo, SolarDate } from './types.js';

export const HOLIDAY_CATEGORY_LABELS: Record<HolidayCategory, string> = {
  Statutory: '法定节假日',
  Traditional: '传统节日',
  OtherTraditional: '民俗节日',
};

export function holidayCategoryLabel(category: HolidayCategory): string {
  return HOLIDAY_CATEGORY_LABELS[category];
}

function holiday(name: string, category: HolidayCategory, note: string): HolidayInfo {
  return Object.freeze({ name, category, note });
}

export const HOLIDAY_SPRING_FESTIVAL = holiday('春节', 'Statutory', '农历正月初一 · 放假4天（除夕至初三）');
export const HOLIDAY_SPRING_EVE = holiday('除夕', 'Statutory', '春节前夜 · 合家团圆');
export const HOLIDAY_NEW_YEAR = holiday('元旦', 'Statutory', '公历1月1日 · 放假1天');
export const HOLIDAY_LABOR_DAY = holiday('劳动节', 'Statutory', '公历5月1日 · 放假2天');
export const HOLIDAY_DRAGON_BOAT = holiday('端午节', 'Statutory', '农历五月初五 · 放假1天');
export const HOLIDAY_MID_AUTUMN = holiday('中秋节', 'Statutory', '农历八月十五 · 放假1天');
export const HOLIDAY_NATIONAL_DAY = holiday('国庆节', 'Statutory', '公历10月1日至3日 · 放假3天');
export const HOLIDAY_QINGMING = holiday('清明节', 'Statutory', '清明时节 · 踏青祭祖 · 放假1天');
export const HOLIDAY_LANTERN = holiday('元宵节', 'Traditional', '农历正月十五 · 元宵赏灯');
export const HOLIDAY_QIXI = holiday('七夕节', 'Traditional', '农历七月初七 · 牛郎织女传说');
export const HOLIDAY_CHONGYANG = holiday('重阳节', 'Traditional', '农历九月初九 · 登高敬老');
export const HOLIDAY_LONGTAITOU = holiday('龙抬头', 'OtherTraditional', '农历二月初二 · 春耕开犁');
export const HOLIDAY_ZHONGYUAN = holiday('中元节', 'OtherTraditional', '农历七月十五 · 中元祭祖');
export const HOLIDAY_LABA = holiday('腊八节', 'OtherTraditional', '农历腊月初八 · 喝腊八粥');
export const HOLIDAY_DONGZHI = holiday('冬至', 'OtherTraditional', '冬至日 · 最重要节气之一');

interface DatedHoliday {
  month: number;
  day: number;
  info: HolidayInfo;
}

/** 公历固定日期的法定节日 */
const SOLAR_HOLIDAYS: readonly DatedHoliday[] = [
  { month: 1, day: 1, info: HOLIDAY_NEW_YEAR },
  { month: 5, day: 1, info: HOLIDAY_LABOR_DAY },
  { month: 10, day: 1, info: HOLIDAY_NATIONAL_DAY },
];

const LUNAR_STATUTORY_HOLIDAYS: readonly DatedHoliday[] = [
  { month: 5, day: 5, info: HOLIDAY_DRAGON_BOAT },
  { month: 8, day: 15, info: HOLIDAY_MID_AUTUMN },
];

const MAJOR_TRADITIONAL_HOLIDAYS: readonly DatedHoliday[] = [
  { month: 1, day: 15, info: HOLIDAY_LANTERN },
  { month: 7, day: 7, info: HOLIDAY_QIXI },
  { month: 9, day: 9, info: HOLIDAY_CHONGYANG },
];

const OTHER_TRADITIONAL_HOLIDAYS: readonly DatedHoliday[] = [
  { month: 2, day: 2, info: HOLIDAY_LONGTAITOU },
  { month: 7, day: 15, info: HOLIDAY_ZHONGYUAN },
  { month: 12, day: 8, info: HOLIDAY_LABA },
];

/** 春节假期涵盖正月初一至初三 */
const SPRING_FESTIVAL_LAST_DAY = 3;

function findDated(holidays: readonly DatedHoliday[], month: number, day: number): HolidayInfo | null {
  const found = holidays.find(h => h.month === month && h.day === day);
  return found ? found.info : null;
}

function solarHoliday(date: SolarDate): HolidayInfo | null {
  return findDated(SOLAR_HOLIDAYS, date.month, date.day);
}

function qingmingHoliday(solarTerm: string | null): HolidayInfo | null {
  return solarTerm === '清明' ? HOLIDAY_QINGMING : null;
}

function lunarStatutoryHoliday(lunar: LunarInfo | null): HolidayInfo | null {
  if (!lunar) {
    return null;
  }
  if (lunar.festival === NEW_YEARS_EVE) {
    return HOLIDAY_SPRING_EVE;
  }
  const { month, day } = lunar.date;
  if (month === 1 && day <= SPRING_FESTIVAL_LAST_DAY) {
    return HOLIDAY_SPRING_FESTIVAL;
  }
  return findDated(LUNAR_STATUTORY_HOLIDAYS, month, day);
}

function majorTraditionalHoliday(lunar: LunarInfo | null): HolidayInfo | null {
  return lunar ? findDated(MAJOR_TRADITIONAL_HOLIDAYS, lunar.date.month, lunar.date.day) : null;
}

function otherTraditionalHoliday(lunar: LunarInfo | null, solarTerm: string | null): HolidayInfo | null {
  const dated = lunar ? findDated(OTHER_TRADITIONAL_HOLIDAYS, lunar.date.month, lunar.date.day) : null;
  if (dated) {
    return dated;
  }
  return solarTerm === '冬至' ? HOLIDAY_DONGZHI : null;
}

/**
 * 依优先顺序判断日期对应的节日，先符合者优先，最多返回一个：
 * 公历节日 > 清明 > 农历法定节日 > 传统节日 > 民俗节日（含冬至）
 */
export function holidayFor(date: SolarDate, lunar: LunarInfo | null, solarTerm: string | null): HolidayInfo | null {
  return (
    solarHoliday(date) ??
    qingmingHoliday(solarTerm) ??
    lunarStatutoryHoliday(lunar) ??
    majorTraditionalHoliday(lunar) ??
    otherTraditionalHoliday(lunar, solarTerm)
  );
}
