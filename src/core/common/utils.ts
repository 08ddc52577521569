// src/core/common/utils.ts

import { v4 as uuidv4 } from 'uuid';

/**
 * Generates a unique Version 4 UUID.
 * @returns A unique identifier string.
 */
export function generateUniqueId(): string {
    return uuidv4();
}

/**
 * Formats a Date as DD/MM/YYYY using its UTC calendar fields.
 * Returns an empty string for null, undefined or an invalid Date.
 */
export function formatDateToDDMMYYYY(date: Date | null | undefined): string {
    if (!(date instanceof Date) || isNaN(date.getTime())) {
        return '';
    }
    const day = String(date.getUTCDate()).padStart(2, '0');
    const month = String(date.getUTCMonth() + 1).padStart(2, '0'); // +1 because months are 0-indexed
    const year = String(date.getUTCFullYear()).padStart(4, '0');
    return `${day}/${month}/${year}`;
}

/**
 * Parses a D/M/YYYY or DD/MM/YYYY string into a Date SET TO UTC NOON.
 * The whole string must match: no surrounding whitespace, no other separator.
 * @returns The parsed Date, or null when the format is wrong or the date does not exist (e.g. 30/02/2001).
 */
export function parseDayMonthYear(dateStr: string): Date | null {
    const match = dateStr.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
    if (!match) return null;

    const day = parseInt(match[1], 10);
    const month = parseInt(match[2], 10); // Month is 1-based from input
    const year = parseInt(match[3], 10);

    if (month < 1 || month > 12 || day < 1 || day > 31 || year < 1) {
        return null;
    }

    const date = new Date(Date.UTC(year, month - 1, day, 12, 0, 0));
    // Date.UTC maps years 0-99 onto 1900-1999
    date.setUTCFullYear(year);

    // Ensure constructed date didn't wrap due to invalid day/month combo
    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }
    return date;
}

/**
 * Moves an instant onto UTC noon of its local calendar day, so that day
 * comparisons follow the server's clock rather than UTC.
 */
export function toLocalCalendarDay(instant: Date): Date {
    return new Date(Date.UTC(instant.getFullYear(), instant.getMonth(), instant.getDate(), 12));
}

/**
 * Compares two dates by UTC calendar day only. Pass local instants through
 * `toLocalCalendarDay` first.
 * @returns true when `date` falls on or before the day of `reference`.
 */
export function isOnOrBeforeDay(date: Date, reference: Date): boolean {
    const dayKey = (d: Date) => d.getUTCFullYear() * 10000 + (d.getUTCMonth() + 1) * 100 + d.getUTCDate();
    return dayKey(date) <= dayKey(reference);
}

/**
 * Share of `part` in `total` as a one-decimal percentage ("66.7%").
 * An empty total has no meaningful share and yields "N/A".
 */
export function formatPercentage(part: number, total: number): string {
    if (total === 0) return 'N/A';
    return `${((part / total) * 100).toFixed(1)}%`;
}
