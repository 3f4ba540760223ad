export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

const MILLISECONDS_PER_DAY = 86_400_000;

// Tried in order; the first shape with any occurrence decides the outcome.
const DATE_PATTERNS: readonly RegExp[] = [
  /(\p{Nd}{4})-(\p{Nd}{2})-(\p{Nd}{2})/gu, // report-2025-11-07.html
  /(\p{Nd}{4})(\p{Nd}{2})(\p{Nd}{2})/gu, // picks_xxx_20250907.json
];

const DECIMAL_DIGIT = /^\p{Nd}$/u;

/**
 * Returns the calendar date embedded in a file name, or `null` when there is
 * none.
 *
 * The rightmost occurrence of the first matching shape wins. When that
 * occurrence is not a real calendar date the name is treated as undated,
 * even if the other shape would have produced a valid one.
 */
export function extractDateFromFilename(filename: string): CalendarDate | null {
  for (const pattern of DATE_PATTERNS) {
    const matches = Array.from(filename.matchAll(pattern));
    const last = matches.at(-1);
    if (!last) {
      continue;
    }

    const [, year = "", month = "", day = ""] = last;
    return toCalendarDate(
      parseDigits(year),
      parseDigits(month),
      parseDigits(day),
    );
  }

  return null;
}

/** Reads a run of decimal digits from any script as a number. */
function parseDigits(digits: string): number {
  return Array.from(digits).reduce(
    (total, digit) => total * 10 + digitValue(digit),
    0,
  );
}

// Decimal digits are encoded in contiguous runs of ten starting at zero.
function digitValue(digit: string): number {
  const codePoint = digit.codePointAt(0) ?? 0;
  let zero = codePoint;
  while (zero > 0 && DECIMAL_DIGIT.test(String.fromCodePoint(zero - 1))) {
    zero -= 1;
  }
  return (codePoint - zero) % 10;
}

export function isValidCalendarDate(
  year: number,
  month: number,
  day: number,
): boolean {
  if (!Number.isInteger(year) || year < 1 || year > 9999) {
    return false;
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    return false;
  }
  return Number.isInteger(day) && day >= 1 && day <= daysInMonth(year, month);
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function toCalendarDate(
  year: number,
  month: number,
  day: number,
): CalendarDate | null {
  if (!isValidCalendarDate(year, month, day)) {
    return null;
  }
  return { year, month, day };
}

/** Local calendar date of `now`, without its time of day. */
export function toLocalCalendarDate(now: Date): CalendarDate {
  return {
    year: now.getFullYear(),
    month: now.getMonth() + 1,
    day: now.getDate(),
  };
}

/** Whole days from `date` to `today`; negative when `date` is in the future. */
export function ageInDays(today: CalendarDate, date: CalendarDate): number {
  return Math.round(
    (toEpochMilliseconds(today) - toEpochMilliseconds(date)) /
      MILLISECONDS_PER_DAY,
  );
}

function toEpochMilliseconds(date: CalendarDate): number {
  // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC.
  const instant = new Date(0);
  instant.setUTCFullYear(date.year, date.month - 1, date.day);
  return instant.getTime();
}

export function formatCalendarDate(date: CalendarDate): string {
  const year = String(date.year).padStart(4, "0");
  const month = String(date.month).padStart(2, "0");
  const day = String(date.day).padStart(2, "0");
  return `${year}-${month}-${day}`;
}
