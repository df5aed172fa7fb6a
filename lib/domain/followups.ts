import { addDays, addMonths, parseDateKey, startOfUtcDay, toDateKey } from "@/utils/dashboard/time";

const WEEKDAYS = ["sunday", "monday", "tuesday", "wednesday", "thursday", "friday", "saturday"];

const NUMBER_WORDS: Record<string, number> = {
  a: 1,
  an: 1,
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12,
};

const RELATIVE_PATTERN = new RegExp(
  `\\b(\\d+|${Object.keys(NUMBER_WORDS).join("|")})\\s+(day|week|month|year)s?\\b`,
);

export const DEFAULT_FOLLOWUP_OFFSET_MONTHS = 1;

function nextWeekday(reference: Date, weekday: number) {
  const diff = (weekday - reference.getUTCDay() + 7) % 7;
  return addDays(reference, diff === 0 ? 7 : diff);
}

function applyRelative(reference: Date, amount: number, unit: string) {
  switch (unit) {
    case "day":
      return addDays(reference, amount);
    case "week":
      return addDays(reference, amount * 7);
    case "month":
      return addMonths(reference, amount);
    default:
      return addMonths(reference, amount * 12);
  }
}

/**
 * Resolves a follow-up due date against the intake time. An explicit `dueDate` wins; otherwise the spoken
 * phrase is interpreted ("6 months", "next week", "friday", "2025-03-01"). Anything unrecognized falls back
 * to one month out.
 */
export function resolveDueDate(
  { dueDate, dueText }: { dueDate?: string | null; dueText?: string | null },
  reference: Date,
): string {
  const today = startOfUtcDay(reference);

  const explicit = dueDate ? parseDateKey(dueDate.trim().slice(0, 10)) : null;
  if (explicit) {
    return toDateKey(explicit);
  }

  const phrase = dueText?.trim().toLowerCase() ?? "";
  const isoInPhrase = phrase.match(/\b(\d{4}-\d{2}-\d{2})\b/);
  const isoDate = isoInPhrase ? parseDateKey(isoInPhrase[1]) : null;
  if (isoDate) {
    return toDateKey(isoDate);
  }

  if (/\btoday\b/.test(phrase)) return toDateKey(today);
  if (/\btomorrow\b/.test(phrase)) return toDateKey(addDays(today, 1));
  if (/\bnext week\b/.test(phrase)) return toDateKey(addDays(today, 7));
  if (/\bnext month\b/.test(phrase)) return toDateKey(addMonths(today, 1));
  if (/\bnext year\b/.test(phrase)) return toDateKey(addMonths(today, 12));

  const relative = phrase.match(RELATIVE_PATTERN);
  if (relative) {
    const amount = NUMBER_WORDS[relative[1]] ?? Number(relative[1]);
    return toDateKey(applyRelative(today, amount, relative[2]));
  }

  const weekday = WEEKDAYS.findIndex((day) => new RegExp(`\\b${day}\\b`).test(phrase));
  if (weekday !== -1) {
    return toDateKey(nextWeekday(today, weekday));
  }

  return toDateKey(addMonths(today, DEFAULT_FOLLOWUP_OFFSET_MONTHS));
}

export function isOverdue(dueDate: string, now: Date) {
  return dueDate < toDateKey(now);
}
