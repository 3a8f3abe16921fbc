export {
  LUNAR_EPOCH,
  MIN_YEAR,
  leapMonth,
  leapMonthDays,
  lunarDayLabel,
  lunarDayNumber,
  lunarDisplayLabel,
  lunarMonthDays,
  lunarMonthLabel,
  lunarToSolar,
  lunarYearDays,
  maxSupportedYear,
  solarToLunar,
  stemBranchYear,
  zodiacAnimal,
} from './lunar.js';
export { LUNAR_FESTIVALS, NEW_YEARS_EVE, lunarFestival } from './festivals.js';
export type { LunarFestival } from './festivals.js';
export {
  SOLAR_TERM_MAX_YEAR,
  SOLAR_TERM_MIN_YEAR,
  SOLAR_TERM_NAMES,
  solarTermDate,
  solarTermName,
  solarTermsOfYear,
} from './solarTerms.js';
export type { SolarTermDate, SolarTermName } from './solarTerms.js';
export { HOLIDAY_CATEGORY_LABELS, holidayCategoryLabel, holidayFor } from './holidays.js';
export {
  buildMonth,
  buildYear,
  clampToSupportedRange,
  describeDay,
  formatDayDetails,
  monthAnchorLunar,
  monthGrid,
} from './calendar.js';
export { parseDateCSV } from './dateCsv.js';
export type { DateCsvResult } from './dateCsv.js';
export { addDays, daysBetween, formatDate, fromLocalDate, isValidDate, parseSolarDate } from './dateUtils.js';
export { generateIndex, saveAllMonths, saveJSON, saveYearlyData } from './output.js';
export type {
  CalendarData,
  CalendarDay,
  CalendarGridCell,
  CalendarHoliday,
  CalendarIndex,
  CalendarIndexEntry,
  CalendarLunar,
  HolidayCategory,
  HolidayInfo,
  LunarDate,
  LunarInfo,
  SolarDate,
  YearlyCalendarData,
} from './types.js';
