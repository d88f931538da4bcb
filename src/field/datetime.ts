// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {RawValue} from '../raw';
import {DateValue, utcDate} from '../value';
import {Field} from './field';

const DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;

/**
 * Schema field for date/time values, stored as `YYYY-MM-DDTHH:MM:SSZ` in UTC.
 *
 * Writes drop everything below one second. A `DateValue` is written as
 * midnight UTC, a number as milliseconds since the Unix epoch.
 */
export class DateTimeField extends Field<Date, Date | DateValue | number> {
    readonly kind = 'date/time';

    decode(raw: RawValue): Date {
        if (typeof raw === 'string') {
            const parsed = parseDateTime(raw);
            if (parsed) {
                return parsed;
            }
        }
        throw this.malformed(raw);
    }

    encode(value: Date | DateValue | number): RawValue {
        const date = value instanceof DateValue ? value.valueOf() : new Date(value instanceof Date ? value.getTime() : value);
        const millis = date.getTime();
        if (!Number.isFinite(millis)) {
            throw new RangeError(`Cannot store an invalid ${this.kind} value`);
        }
        return formatDateTime(new Date(millis - mod(millis, 1000)));
    }
}

function mod(value: number, divisor: number): number {
    return ((value % divisor) + divisor) % divisor;
}

function parseDateTime(str: string): Date | null {
    // Fractional seconds and the zone designator are not part of the stored form
    const match = str.trim().split('.', 1)[0].replace(/Z$/, '').match(DATE_TIME);
    if (!match) {
        return null;
    }

    const [year, month, day, hour, minute, second] = match.slice(1).map(part => parseInt(part, 10));
    if (hour > 23 || minute > 59 || second > 59) {
        return null;
    }

    const date = utcDate(year, month, day);
    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return null;
    }
    date.setUTCHours(hour, minute, second, 0);
    return date;
}

function formatDateTime(date: Date): string {
    const pad = (value: number, width = 2) => String(value).padStart(width, '0');
    return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}` +
        `T${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}Z`;
}
