// Calendar helpers for the alert and dashboard windows. Everything is computed in UTC so a scan
// gives the same answer regardless of the server's timezone.

const MS_PER_HOUR = 60 * 60 * 1000;
const MS_PER_DAY = 24 * MS_PER_HOUR;

export function toDateKey(date: Date) {
  return date.toISOString().slice(0, 10);
}

export function parseDateKey(value: string): Date | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return null;
  }
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return Number.isNaN(parsed.getTime()) || toDateKey(parsed) !== value ? null : parsed;
}

export function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) {
    return null;
  }
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export function startOfUtcDay(date: Date) {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export const addDays = (date: Date, days: number) => new Date(date.getTime() + days * MS_PER_DAY);

export const addHours = (date: Date, hours: number) => new Date(date.getTime() + hours * MS_PER_HOUR);

// Clamps to the last day of the target month (Jan 31 + 1 month = Feb 28/29).
export function addMonths(date: Date, months: number) {
  const year = date.getUTCFullYear();
  const month = date.getUTCMonth() + months;
  const lastDayOfTarget = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
  return new Date(
    Date.UTC(year, month, Math.min(date.getUTCDate(), lastDayOfTarget)),
  );
}

export function hoursBetween(earlier: Date, later: Date) {
  return (later.getTime() - earlier.getTime()) / MS_PER_HOUR;
}

export function daysBetween(earlier: Date, later: Date) {
  return (later.getTime() - earlier.getTime()) / MS_PER_DAY;
}
