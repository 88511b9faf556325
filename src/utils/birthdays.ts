const DAY_MS = 24 * 60 * 60 * 1000;

const pad = (value: number): string => value.toString().padStart(2, '0');

const isLeapYear = (year: number): boolean => (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;

export const monthDayKey = (month: number, day: number): string => `${pad(month)}-${pad(day)}`;

/**
 * "MM-DD" part of a YYYY-MM-DD birthday.
 */
export const birthdayKey = (birthday: string): string => birthday.slice(5, 10);

/**
 * Month/day keys for every calendar day from `today` to `today + days`
 * inclusive (UTC), in calendar order. The year is ignored, so a window
 * starting Dec 29 continues into January. Feb 29 birthdays are observed on
 * Feb 28 in non-leap years.
 */
export const upcomingBirthdayKeys = (today: Date, days: number): string[] => {
  const start = Date.UTC(today.getUTCFullYear(), today.getUTCMonth(), today.getUTCDate());
  const keys: string[] = [];

  for (let offset = 0; offset <= days; offset++) {
    const date = new Date(start + offset * DAY_MS);
    const month = date.getUTCMonth() + 1;
    const day = date.getUTCDate();
    keys.push(monthDayKey(month, day));
    if (month === 2 && day === 28 && !isLeapYear(date.getUTCFullYear())) {
      keys.push(monthDayKey(2, 29));
    }
  }

  return [...new Set(keys)];
};

/**
 * YYYY-MM-DD of `date + days` in UTC.
 */
export const addDaysIso = (date: Date, days: number): string =>
  new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()) + days * DAY_MS)
    .toISOString()
    .slice(0, 10);
