// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {Type, Value} from "./type";

/**
 * A time of day (hour, minute, second, nanosecond) without date information.
 * Internally stored as nanoseconds since midnight.
 */
export class TimeValue implements Value {
    readonly type: Type = "Time" as const;
    public readonly value: bigint; // nanoseconds since midnight

    private static readonly NANOS_PER_MILLI = 1_000_000n;
    private static readonly NANOS_PER_SECOND = 1_000_000_000n;
    private static readonly NANOS_PER_MINUTE = 60_000_000_000n;
    private static readonly NANOS_PER_HOUR = 3_600_000_000_000n;
    private static readonly NANOS_PER_DAY = 86_400_000_000_000n;

    constructor(value: bigint | string | number) {
        if (typeof value === 'string') {
            // Parse HH:MM:SS[.nnnnnnnnn] format
            const parsed = TimeValue.parseTime(value.trim());
            if (parsed === null) {
                throw new Error(`Invalid time string: ${value}`);
            }
            this.value = parsed;
        } else {
            // Accept number as nanoseconds since midnight
            const nanos = typeof value === 'bigint' ? value : BigInt(Math.floor(value));
            if (nanos < 0n || nanos >= TimeValue.NANOS_PER_DAY) {
                throw new Error(`Time value must be between 0 and ${TimeValue.NANOS_PER_DAY - 1n} nanoseconds`);
            }
            this.value = nanos;
        }
    }

    /**
     * Create a TimeValue from hour, minute, second, and nanosecond
     */
    static fromHMSN(hour: number, minute: number, second: number, nano: number = 0): TimeValue {
        if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
            throw new Error(`Invalid hour: ${hour}`);
        }
        if (!Number.isInteger(minute) || minute < 0 || minute > 59) {
            throw new Error(`Invalid minute: ${minute}`);
        }
        if (!Number.isInteger(second) || second < 0 || second > 59) {
            throw new Error(`Invalid second: ${second}`);
        }
        if (!Number.isInteger(nano) || nano < 0 || nano > 999_999_999) {
            throw new Error(`Invalid nanosecond: ${nano}`);
        }

        return new TimeValue(BigInt(hour) * TimeValue.NANOS_PER_HOUR +
            BigInt(minute) * TimeValue.NANOS_PER_MINUTE +
            BigInt(second) * TimeValue.NANOS_PER_SECOND +
            BigInt(nano));
    }

    static fromHMS(hour: number, minute: number, second: number): TimeValue {
        return TimeValue.fromHMSN(hour, minute, second, 0);
    }

    /**
     * The UTC time of day of a Date, at millisecond precision
     */
    static fromDate(date: Date): TimeValue {
        if (!Number.isFinite(date.getTime())) {
            throw new Error('Time value must come from a valid Date');
        }
        return TimeValue.fromHMSN(
            date.getUTCHours(),
            date.getUTCMinutes(),
            date.getUTCSeconds(),
            date.getUTCMilliseconds() * 1_000_000
        );
    }

    static midnight(): TimeValue {
        return new TimeValue(0n);
    }

    /**
     * Parse a time string in HH:MM:SS[.nnnnnnnnn] format
     */
    static parse(str: string): TimeValue {
        const parsed = TimeValue.tryParse(str);
        if (!parsed) {
            throw new Error(`Cannot parse "${str}" as Time`);
        }
        return parsed;
    }

    static tryParse(str: string): TimeValue | null {
        const parsed = TimeValue.parseTime(str.trim());
        return parsed === null ? null : new TimeValue(parsed);
    }

    /**
     * Hour component (0-23)
     */
    hour(): number {
        return Number(this.value / TimeValue.NANOS_PER_HOUR);
    }

    /**
     * Minute component (0-59)
     */
    minute(): number {
        return Number((this.value % TimeValue.NANOS_PER_HOUR) / TimeValue.NANOS_PER_MINUTE);
    }

    /**
     * Second component (0-59)
     */
    second(): number {
        return Number((this.value % TimeValue.NANOS_PER_MINUTE) / TimeValue.NANOS_PER_SECOND);
    }

    /**
     * Nanosecond component (0-999999999)
     */
    nanosecond(): number {
        return Number(this.value % TimeValue.NANOS_PER_SECOND);
    }

    /**
     * Drops everything below one second
     */
    truncate(): TimeValue {
        return new TimeValue(this.value - (this.value % TimeValue.NANOS_PER_SECOND));
    }

    toMillisSinceMidnight(): number {
        return Number(this.value / TimeValue.NANOS_PER_MILLI);
    }

    /**
     * Format as HH:MM:SS, followed by .nnnnnnnnn when there is a fractional part
     */
    toString(): string {
        const hourStr = String(this.hour()).padStart(2, '0');
        const minuteStr = String(this.minute()).padStart(2, '0');
        const secondStr = String(this.second()).padStart(2, '0');
        const nano = this.nanosecond();

        const base = `${hourStr}:${minuteStr}:${secondStr}`;
        return nano === 0 ? base : `${base}.${String(nano).padStart(9, '0')}`;
    }

    valueOf(): bigint {
        return this.value;
    }

    equals(other: Value): boolean {
        if (!(other instanceof TimeValue)) {
            return false;
        }
        return this.value === other.value;
    }

    private static parseTime(str: string): bigint | null {
        // Match HH:MM:SS or HH:MM:SS.fractional
        const match = str.match(/^(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?$/);
        if (!match) {
            return null;
        }

        const hour = parseInt(match[1], 10);
        const minute = parseInt(match[2], 10);
        const second = parseInt(match[3], 10);

        let nano = 0;
        if (match[4]) {
            nano = parseInt(match[4].padEnd(9, '0'), 10);
        }

        if (hour > 23 || minute > 59 || second > 59) {
            return null;
        }

        return BigInt(hour) * TimeValue.NANOS_PER_HOUR +
            BigInt(minute) * TimeValue.NANOS_PER_MINUTE +
            BigInt(second) * TimeValue.NANOS_PER_SECOND +
            BigInt(nano);
    }
}
