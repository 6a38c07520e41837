// src/core/common/utils.ts

import { v4 as uuidv4 } from 'uuid';
import { TimeoutError } from './errors';

/**
 * Generates a unique Version 4 UUID.
 * @returns A unique identifier string.
 */
export function generateUniqueId(): string {
    return uuidv4();
}

/**
 * Simple utility to pause execution for a specified duration.
 * @param ms Milliseconds to sleep.
 */
export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Formats a date as yyyy-MM-dd using its UTC calendar day.
 */
export function formatIsoDate(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0'); // +1 because months are 0-indexed
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

// yyyy-MM-dd with an optional time and no zone designator
const OFFSETLESS_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3})\d*)?)?)?$/;

/**
 * Reads a timestamp without a zone designator as UTC, so that formatIsoDate
 * gives back the calendar day that was written. Returns null for impossible
 * dates such as 2024-02-30, and undefined when the string is not of that shape.
 */
function parseOffsetlessDate(value: string): Date | null | undefined {
    const match = OFFSETLESS_DATE.exec(value);
    if (!match) {
        return undefined;
    }
    const [, year, month, day, hours = '0', minutes = '0', seconds = '0', millis = '0'] = match;
    const parsed = new Date(Date.UTC(
        Number(year), Number(month) - 1, Number(day),
        Number(hours), Number(minutes), Number(seconds), Number(millis.padEnd(3, '0'))
    ));
    if (parsed.getUTCMonth() !== Number(month) - 1 || parsed.getUTCDate() !== Number(day)) {
        return null;
    }
    return parsed;
}

/**
 * Parses a date from a request body or a billing payload.
 * Accepts Date objects, ISO strings and epoch milliseconds; anything else yields null.
 * Date-only and offset-less strings are calendar dates in UTC, whatever the host zone.
 */
export function parseDateValue(value: unknown): Date | null {
    if (value instanceof Date) {
        return isNaN(value.getTime()) ? null : value;
    }
    if (typeof value === 'string' && value.trim() !== '') {
        const trimmed = value.trim();
        const calendarDate = parseOffsetlessDate(trimmed);
        if (calendarDate !== undefined) {
            return calendarDate;
        }
        const parsed = new Date(trimmed);
        return isNaN(parsed.getTime()) ? null : parsed;
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
        return new Date(value);
    }
    return null;
}

/**
 * Runs an operation under a time budget. The operation receives a signal that aborts
 * when the budget is spent, so HTTP calls are cancelled rather than left dangling.
 * @throws {TimeoutError} when the budget is exceeded.
 */
export async function withTimeout<T>(
    operation: string,
    timeoutMs: number,
    work: (signal: AbortSignal) => Promise<T>
): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const error = new TimeoutError(operation, timeoutMs);
            controller.abort(error);
            reject(error);
        }, timeoutMs);
    });

    try {
        return await Promise.race([work(controller.signal), timeout]);
    } finally {
        clearTimeout(timer);
    }
}
