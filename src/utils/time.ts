export interface TimeOfDay {
    hour: number;
    minute: number;
}

/** A calendar date written as `YYYY-MM-DD`. */
export type CalendarDate = string;

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const TIME_OF_DAY_PATTERN = /^(\d{1,2}):(\d{2})$/;
const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function parseTimeOfDay(value: string): TimeOfDay | null {
    const match = TIME_OF_DAY_PATTERN.exec(value.trim());
    if (!match) return null;

    const hour = Number(match[1]);
    const minute = Number(match[2]);
    if (hour > 23 || minute > 59) return null;

    return { hour, minute };
}

function pad2(value: number): string {
    return value.toString().padStart(2, '0');
}

export function formatTimeOfDay({ hour, minute }: TimeOfDay): string {
    return `${pad2(hour)}:${pad2(minute)}`;
}

export function toDailyCronExpression({ hour, minute }: TimeOfDay): string {
    return `${minute} ${hour} * * *`;
}

export function isValidTimeZone(timeZone: string): boolean {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone });
        return true;
    } catch {
        return false;
    }
}

/**
 * Calendar date of `instant` as seen on a wall clock in `timeZone`.
 * A message sent at 00:10 local time belongs to the new day even when it is
 * still the previous day in UTC.
 */
export function calendarDate(instant: Date, timeZone: string): CalendarDate {
    const parts = new Intl.DateTimeFormat('en-GB', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
    }).formatToParts(instant);
    const getPart = (type: Intl.DateTimeFormatPartTypes): string =>
        parts.find(part => part.type === type)?.value ?? '';

    return `${getPart('year')}-${getPart('month')}-${getPart('day')}`;
}

/** Midnight UTC of the date in milliseconds, or null for anything that is not a real date. */
function calendarDateToUTC(value: CalendarDate): number | null {
    const match = CALENDAR_DATE_PATTERN.exec(value);
    if (!match) return null;

    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    const utc = Date.UTC(year, month - 1, day);
    const check = new Date(utc);
    if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
        return null;
    }
    return utc;
}

export function isCalendarDate(value: string): boolean {
    return calendarDateToUTC(value) !== null;
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: CalendarDate, to: CalendarDate): number | null {
    const start = calendarDateToUTC(from);
    const end = calendarDateToUTC(to);
    if (start === null || end === null) return null;

    return Math.round((end - start) / MS_PER_DAY);
}

export function laterDate(a: CalendarDate, b: CalendarDate): CalendarDate {
    return a >= b ? a : b;
}
