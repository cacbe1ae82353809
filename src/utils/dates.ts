/**
 * Calendar-date helpers. Dates travel through the engine as ISO
 * `YYYY-MM-DD` strings so comparisons are plain string comparisons and
 * results never depend on the server timezone.
 */

export interface DateRange {
  /** inclusive, YYYY-MM-DD */
  from: string;
  /** inclusive, YYYY-MM-DD */
  to: string;
}

const MS_PER_DAY = 86_400_000;

const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ].*)?$/;
const DAY_FIRST_DATE = /^(\d{1,2})[./-](\d{1,2})[./-](\d{4})(?:[T ].*)?$/;

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

function formatParts(year: number, month: number, day: number): string | null {
  if (year < 1900 || year > 2100 || month < 1 || month > 12 || day < 1 || day > 31) {
    return null;
  }

  // Date.UTC rolls Feb 31 over into March; reject that
  const check = new Date(Date.UTC(year, month - 1, day));
  if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }
  return `${year}-${pad(month)}-${pad(day)}`;
}

/**
 * Local calendar date of a Date instance (pg hands `date` columns back
 * as local midnight)
 */
export function toIsoDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Parse a source date into YYYY-MM-DD, or null when it cannot be read.
 * Accepts Date objects, ISO dates/timestamps and day-first dd/mm/yyyy,
 * dd-mm-yyyy or dd.mm.yyyy.
 */
export function parseIsoDate(value: unknown): string | null {
  if (value instanceof Date) {
    return isNaN(value.getTime()) ? null : toIsoDate(value);
  }
  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();
  if (text === '') {
    return null;
  }

  const iso = ISO_DATE.exec(text);
  if (iso) {
    return formatParts(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const dayFirst = DAY_FIRST_DATE.exec(text);
  if (dayFirst) {
    return formatParts(Number(dayFirst[3]), Number(dayFirst[2]), Number(dayFirst[1]));
  }

  return null;
}

export function isIsoDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && parseIsoDate(value) === value;
}

function toEpochDay(iso: string): number {
  const [year, month, day] = iso.split('-').map(Number);
  return Date.UTC(year, month - 1, day) / MS_PER_DAY;
}

function fromEpochDay(epochDay: number): string {
  const date = new Date(epochDay * MS_PER_DAY);
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

export function addDays(iso: string, days: number): string {
  return fromEpochDay(toEpochDay(iso) + days);
}

/**
 * Number of calendar days in a range, counting both ends
 */
export function inclusiveDayCount(range: DateRange): number {
  return toEpochDay(range.to) - toEpochDay(range.from) + 1;
}

export function isWithin(date: string | null, range: DateRange): boolean {
  return date !== null && date >= range.from && date <= range.to;
}

/**
 * First to last day of a `YYYY-MM` month
 */
export function monthRange(month: string): DateRange {
  const match = /^(\d{4})-(\d{2})$/.exec(month);
  if (!match) {
    throw new Error(`Invalid month: ${month}`);
  }
  const year = Number(match[1]);
  const monthIndex = Number(match[2]);
  if (monthIndex < 1 || monthIndex > 12) {
    throw new Error(`Invalid month: ${month}`);
  }

  const lastDay = new Date(Date.UTC(year, monthIndex, 0)).getUTCDate();
  return {
    from: `${year}-${pad(monthIndex)}-01`,
    to: `${year}-${pad(monthIndex)}-${pad(lastDay)}`,
  };
}

export function monthOf(iso: string): string {
  return iso.slice(0, 7);
}
