/** 公历日期（不含时区与时间） */
export interface SolarDate {
  year: number;
  month: number; // 1-12
  day: number; // 1-31
}

export interface LunarDate {
  year: number;
  month: number; // 1-12
  day: number; // 1-30
  isLeap: boolean; // 是否为闰月
}

export interface LunarInfo {
  date: LunarDate;
  festival: string | null; // 农历节日，腊月最后一天固定为「除夕」
}

export type HolidayCategory = 'Statutory' | 'Traditional' | 'OtherTraditional';

export interface HolidayInfo {
  name: string;
  category: HolidayCategory;
  note: string;
}

export interface CalendarLunar {
  year: number;
  month: number;
  day: number;
  isLeap: boolean;
  monthLabel: string; // 例如「闰二月」
  dayLabel: string; // 例如「初一」
  festival: string | null;
  stemBranch: string; // 干支纪年
  zodiac: string;
}

export interface CalendarHoliday {
  name: string;
  category: HolidayCategory;
  categoryLabel: string;
  note: string;
}

export interface CalendarDay {
  date: string; // YYYY-MM-DD
  weekday: number; // 0=Sunday
  isWeekend: boolean; // 是否为周末（六日）
  lunar: CalendarLunar | null; // 超出农历支持范围时为 null
  solarTerm: string | null;
  holiday: CalendarHoliday | null;
  label: string; // 显示优先级：节日 > 节气 > 农历日
}

/** 月历格子：另外标记是否属于本月与是否为今天 */
export interface CalendarGridCell extends CalendarDay {
  isCurrentMonth: boolean;
  isToday: boolean;
}

export interface CalendarData {
  year: number;
  month: number;
  anchor: CalendarLunar | null; // 当月 1 日的农历，供月历标题显示干支与生肖
  days: CalendarDay[];
  generatedAt: string;
}

export interface YearlyCalendarData {
  year: number;
  months: {
    month: number;
    anchor: CalendarLunar | null;
    days: CalendarDay[];
  }[];
  generatedAt: string;
}

export interface CalendarIndexEntry {
  year: number;
  month: number | null;
  file: string;
  url: string;
  isYearly?: boolean;
}

export interface CalendarIndex {
  availableCalendars: CalendarIndexEntry[];
  generatedAt: string;
  supportedRange: {
    lunar: { minYear: number; maxYear: number };
    solarTerms: { minYear: number; maxYear: number };
  };
}
