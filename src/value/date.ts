// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {Type, Value} from "./type";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * A calendar date (year, month, day) without time information.
 * Always interpreted in UTC.
 * Internally stored as months and days.
 */
export class DateValue implements Value {
    readonly type: Type = "Date" as const;
    private readonly months: number; // years*12 + months
    private readonly days: number;   // day of month (1-31)

    constructor(value: Date | string | number) {
        if (value instanceof Date) {
            if (!Number.isFinite(value.getTime())) {
                throw new Error('Date value must be a valid Date');
            }
            // Remove time component - keep the UTC calendar date
            this.months = value.getUTCFullYear() * 12 + value.getUTCMonth();
            this.days = value.getUTCDate();
        } else if (typeof value === 'string') {
            const parsed = DateValue.parseDate(value.trim());
            if (!parsed) {
                throw new Error(`Invalid date string: ${value}`);
            }
            this.months = parsed.months;
            this.days = parsed.days;
        } else {
            // Interpret as days since epoch
            if (!Number.isInteger(value)) {
                throw new Error(`Invalid days since epoch: ${value}`);
            }
            const date = new Date(value * MS_PER_DAY);
            this.months = date.getUTCFullYear() * 12 + date.getUTCMonth();
            this.days = date.getUTCDate();
        }
    }

    /**
     * Create a DateValue from year, month (1-12), and day (1-31)
     */
    static fromYMD(year: number, month: number, day: number): DateValue {
        if (!DateValue.isValidDate(year, month, day)) {
            throw new Error(`Invalid date: ${DateValue.format(year, month, day)}`);
        }
        return new DateValue(utcDate(year, month, day));
    }

    /**
     * Parse a date string in YYYY-MM-DD format
     */
    static parse(str: string): DateValue {
        const parsed = DateValue.tryParse(str);
        if (!parsed) {
            throw new Error(`Cannot parse "${str}" as Date`);
        }
        return parsed;
    }

    static tryParse(str: string): DateValue | null {
        const parsed = DateValue.parseDate(str.trim());
        if (!parsed) {
            return null;
        }
        return DateValue.fromYMD(Math.floor(parsed.months / 12), (parsed.months % 12) + 1, parsed.days);
    }

    year(): number {
        return Math.floor(this.months / 12);
    }

    /**
     * Month component (1-12)
     */
    month(): number {
        return (this.months % 12) + 1;
    }

    day(): number {
        return this.days;
    }

    /**
     * Convert to days since Unix epoch (1970-01-01)
     */
    toDaysSinceEpoch(): number {
        return Math.floor(this.valueOf().getTime() / MS_PER_DAY);
    }

    /**
     * Format as YYYY-MM-DD string
     */
    toString(): string {
        return DateValue.format(this.year(), this.month(), this.day());
    }

    /**
     * Midnight UTC of this date
     */
    valueOf(): Date {
        return utcDate(this.year(), this.month(), this.day());
    }

    equals(other: Value): boolean {
        if (!(other instanceof DateValue)) {
            return false;
        }
        return this.months === other.months && this.days === other.days;
    }

    private static format(year: number, month: number, day: number): string {
        return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
    }

    private static parseDate(str: string): { months: number; days: number } | null {
        const match = str.match(/^(\d{4})-(\d{2})-(\d{2})$/);
        if (!match) {
            return null;
        }

        const year = parseInt(match[1], 10);
        const month = parseInt(match[2], 10);
        const day = parseInt(match[3], 10);

        // Validate the date is valid (e.g., no Feb 30)
        if (!DateValue.isValidDate(year, month, day)) {
            return null;
        }

        return {
            months: year * 12 + (month - 1),
            days: day
        };
    }

    private static isValidDate(year: number, month: number, day: number): boolean {
        if (month < 1 || month > 12 || day < 1 || day > 31) {
            return false;
        }
        const date = utcDate(year, month, day);
        return date.getUTCFullYear() === year &&
               date.getUTCMonth() === month - 1 &&
               date.getUTCDate() === day;
    }
}

/**
 * Date.UTC maps years 0-99 onto 1900-1999, so those are set explicitly.
 */
export function utcDate(year: number, month: number, day: number): Date {
    if (year >= 0 && year < 100) {
        const date = new Date(Date.UTC(2000, month - 1, day));
        date.setUTCFullYear(year);
        return date;
    }
    return new Date(Date.UTC(year, month - 1, day));
}
