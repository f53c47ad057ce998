import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import timezone from 'dayjs/plugin/timezone';
import customParseFormat from 'dayjs/plugin/customParseFormat';
import { env } from '../config/env';

dayjs.extend(utc);
dayjs.extend(timezone);
dayjs.extend(customParseFormat);

export type DbTimestamp = Date | string | number;

// ─── Number Formatting ───────────────────────────────────────────
// Thousands grouping, no decimals: 1234567.4 -> "1,234,567"
export function formatAmount(value: number | string | null | undefined): string {
  if (value === null || value === undefined || value === '') return '0';
  const num = typeof value === 'string' ? parseFloat(value) : value;
  if (isNaN(num)) return '0';
  return Math.round(num).toLocaleString('en-US');
}

export function formatCurrency(value: number | string | null | undefined): string {
  return `${env.CURRENCY_CODE} ${formatAmount(value)}`;
}

// ─── Date Handling ───────────────────────────────────────────────
// Timestamps are stored in UTC; calendar dates (due dates, daily buckets)
// are always taken in the business time zone.

/** Normalize a driver timestamp (Date, ISO string or epoch millis) to a Date */
export function toDate(value: DbTimestamp): Date {
  if (value instanceof Date) return value;
  if (typeof value === 'number') return new Date(value);
  const asNumber = Number(value);
  if (value.trim() !== '' && !Number.isNaN(asNumber)) return new Date(asNumber);
  return dayjs.utc(value).toDate();
}

/** Calendar date (YYYY-MM-DD) of a timestamp in the business time zone */
export function toLocalDateString(value: DbTimestamp, zone: string = env.BUSINESS_TIMEZONE): string {
  return dayjs(toDate(value)).tz(zone).format('YYYY-MM-DD');
}

export function todayLocal(zone: string = env.BUSINESS_TIMEZONE): string {
  return dayjs().tz(zone).format('YYYY-MM-DD');
}

export function addDays(date: string, days: number): string {
  return dayjs(date).add(days, 'day').format('YYYY-MM-DD');
}

/** Half-open UTC range [start, end) covering whole local days from `from` to `to` */
export function localDateRange(
  from: string,
  to: string,
  zone: string = env.BUSINESS_TIMEZONE
): { start: Date; end: Date } {
  const start = dayjs.tz(from, zone).startOf('day');
  const end = dayjs.tz(to, zone).startOf('day').add(1, 'day');
  return { start: start.toDate(), end: end.toDate() };
}

export function localDayStart(date: string, zone: string = env.BUSINESS_TIMEZONE): Date {
  return dayjs.tz(date, zone).startOf('day').toDate();
}

/** First day of the month containing `date`, as YYYY-MM-DD */
export function monthStart(date: string): string {
  return dayjs(date).startOf('month').format('YYYY-MM-DD');
}

/** A real calendar date written as YYYY-MM-DD; rolls like 02-31 are rejected */
export function isValidDateString(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && dayjs(value, 'YYYY-MM-DD', true).isValid();
}

/** 2026-03-09 -> "09/03/2026" */
export function formatDisplayDate(date: string): string {
  const d = dayjs(date);
  return d.isValid() ? d.format('DD/MM/YYYY') : date;
}

/** Local date-time for exports, e.g. "2026-03-02 01:30" */
export function formatLocalDateTime(value: DbTimestamp, zone: string = env.BUSINESS_TIMEZONE): string {
  return dayjs(toDate(value)).tz(zone).format('YYYY-MM-DD HH:mm');
}
