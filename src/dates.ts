/**
 * Calendar-date helpers for due-date views.
 *
 * Calendar dates are `YYYY-MM-DD` strings, which compare correctly as strings.
 * Timestamps carrying an offset are placed into the configured time zone;
 * date-only values and timestamps without an offset are read as written.
 */

export type ParsedDate =
  | { kind: 'date'; date: string }
  | { kind: 'instant'; epochMs: number };

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;

function isRealDate(year: number, month: number, day: number): boolean {
  const d = new Date(Date.UTC(year, month - 1, day));
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

export function parseDate(raw: string): ParsedDate | null {
  const value = raw.trim();

  const dateOnly = DATE_ONLY.exec(value);
  if (dateOnly) {
    const [, y, m, d] = dateOnly;
    return isRealDate(Number(y), Number(m), Number(d)) ? { kind: 'date', date: value } : null;
  }

  const dateTime = DATE_TIME.exec(value);
  if (!dateTime) return null;
  const [, y, m, d, hh, mm, ss, fraction, offset] = dateTime;
  if (!isRealDate(Number(y), Number(m), Number(d))) return null;
  if (Number(hh) > 23 || Number(mm) > 59 || Number(ss ?? '0') > 59) return null;

  if (!offset) {
    return { kind: 'date', date: `${y}-${m}-${d}` };
  }

  // TickTick writes offsets as +0000; Date.parse wants +00:00
  const normalizedOffset = offset === 'Z' ? 'Z' : `${offset.slice(0, 3)}:${offset.slice(-2)}`;
  const epochMs = Date.parse(`${y}-${m}-${d}T${hh}:${mm}:${ss ?? '00'}${fraction ?? ''}${normalizedOffset}`);
  return Number.isNaN(epochMs) ? null : { kind: 'instant', epochMs };
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

export function calendarDateOf(epochMs: number, timeZone: string): string {
  const parts = formatterFor(timeZone).formatToParts(new Date(epochMs));
  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value ?? '';
  return `${part('year')}-${part('month')}-${part('day')}`;
}

export function toCalendarDate(parsed: ParsedDate, timeZone: string): string {
  return parsed.kind === 'date' ? parsed.date : calendarDateOf(parsed.epochMs, timeZone);
}

export function todayIn(timeZone: string, now: Date): string {
  return calendarDateOf(now.getTime(), timeZone);
}

export function addDays(date: string, days: number): string {
  const [y, m, d] = date.split('-').map(Number);
  return new Date(Date.UTC(y, m - 1, d + days)).toISOString().slice(0, 10);
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}
