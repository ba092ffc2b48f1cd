import { addDays, differenceInCalendarDays, format, isValid, parse, parseISO } from 'date-fns';

// Business calendar. createApp() points it at TIME_ZONE.
let calendarZone = 'America/Sao_Paulo';

export function setTimeZone(zone: string): void {
  calendarZone = zone;
}

export function getTimeZone(): string {
  return calendarZone;
}

const isoDayFormatter = (zone: string) =>
  new Intl.DateTimeFormat('en-CA', {
    timeZone: zone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit'
  });

/** Calendar date (YYYY-MM-DD) of an instant in the business time zone. */
export function dateOf(instant: Date | string): string {
  const value = typeof instant === 'string' ? new Date(instant) : instant;
  return isoDayFormatter(calendarZone).format(value);
}

export function today(): string {
  return dateOf(new Date());
}

export function nowIso(): string {
  return new Date().toISOString();
}

export function addDaysIso(day: string, amount: number): string {
  return format(addDays(parseISO(day), amount), 'yyyy-MM-dd');
}

export function daysBetween(later: string, earlier: string): number {
  return differenceInCalendarDays(parseISO(later), parseISO(earlier));
}

const INPUT_FORMATS = ['dd/MM/yyyy', 'yyyy-MM-dd'];

/** Accepts dd/mm/yyyy or yyyy-mm-dd. Returns YYYY-MM-DD, or null when unreadable. */
export function parseDateInput(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const raw = value.trim();
  if (!raw) return null;

  for (const pattern of INPUT_FORMATS) {
    const parsed = parse(raw, pattern, new Date(2000, 0, 1));
    if (isValid(parsed) && format(parsed, pattern) === raw) {
      return format(parsed, 'yyyy-MM-dd');
    }
  }
  return null;
}

/** "HH:MM" (or "H:MM") -> "HH:MM"; null when not a time of day. */
export function parseTimeInput(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const match = /^(\d{1,2}):(\d{2})(?::\d{2})?$/.exec(value.trim());
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return null;
  return `${String(hours).padStart(2, '0')}:${match[2]}`;
}

export const MONTH_ABBREVIATIONS = [
  'Jan',
  'Fev',
  'Mar',
  'Abr',
  'Mai',
  'Jun',
  'Jul',
  'Ago',
  'Set',
  'Out',
  'Nov',
  'Dez'
] as const;

// "2024-03-01" -> "Mar/2024"
export function monthLabel(day: string): string {
  const [year, month] = day.split('-');
  return `${MONTH_ABBREVIATIONS[Number(month) - 1]}/${year}`;
}

// "2024-03-07" -> "07/03"
export function dayMonthLabel(day: string): string {
  const [, month, date] = day.split('-');
  return `${date}/${month}`;
}

// "2024-03-07" -> "07/03/2024"
export function brazilianDate(day: string): string {
  const [year, month, date] = day.split('-');
  return `${date}/${month}/${year}`;
}
