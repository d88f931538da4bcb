// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {describe, expect, it} from 'vitest';
import {TimeValue} from '../../src';

describe('TimeValue', () => {
    describe('constructor', () => {
        it('should create instance from nanoseconds', () => {
            const time = new TimeValue(3_723_000_000_000n);
            expect(time.type).toBe('Time');
            expect(time.toString()).toBe('01:02:03');
        });

        it('should create instance from a string', () => {
            expect(new TimeValue('12:30:45').toString()).toBe('12:30:45');
            expect(new TimeValue('12:30:45.5').nanosecond()).toBe(500_000_000);
        });

        it('should reject values outside one day', () => {
            expect(() => new TimeValue(-1n)).toThrow('Time value must be between 0 and 86399999999999 nanoseconds');
            expect(() => new TimeValue(86_400_000_000_000n)).toThrow('Time value must be between 0 and 86399999999999 nanoseconds');
        });

        it('should reject malformed strings', () => {
            expect(() => new TimeValue('24:00:00')).toThrow('Invalid time string: 24:00:00');
            expect(() => new TimeValue('1:2:3')).toThrow('Invalid time string: 1:2:3');
        });
    });

    describe('fromHMSN', () => {
        it('should build from components', () => {
            const time = TimeValue.fromHMSN(23, 59, 59, 999_999_999);
            expect(time.hour()).toBe(23);
            expect(time.minute()).toBe(59);
            expect(time.second()).toBe(59);
            expect(time.nanosecond()).toBe(999_999_999);
            expect(time.toString()).toBe('23:59:59.999999999');
        });

        it('should validate every component', () => {
            expect(() => TimeValue.fromHMSN(24, 0, 0)).toThrow('Invalid hour: 24');
            expect(() => TimeValue.fromHMSN(0, 60, 0)).toThrow('Invalid minute: 60');
            expect(() => TimeValue.fromHMSN(0, 0, 60)).toThrow('Invalid second: 60');
            expect(() => TimeValue.fromHMSN(0, 0, 0, 1_000_000_000)).toThrow('Invalid nanosecond: 1000000000');
        });
    });

    describe('fromDate', () => {
        it('should take the UTC time of day', () => {
            const time = TimeValue.fromDate(new Date('2024-03-15T08:09:10.250Z'));
            expect(time.toString()).toBe('08:09:10.250000000');
            expect(time.toMillisSinceMidnight()).toBe(29_350_250);
        });
    });

    describe('truncate', () => {
        it('should drop the fractional second', () => {
            expect(new TimeValue('10:00:01.75').truncate().toString()).toBe('10:00:01');
        });
    });

    describe('parse', () => {
        it('should parse or report failure', () => {
            expect(TimeValue.parse('00:00:00').equals(TimeValue.midnight())).toBe(true);
            expect(TimeValue.tryParse('noon')).toBeNull();
            expect(() => TimeValue.parse('noon')).toThrow('Cannot parse "noon" as Time');
        });
    });

    describe('equals', () => {
        it('should compare nanoseconds', () => {
            expect(TimeValue.fromHMS(1, 2, 3).equals(new TimeValue('01:02:03.000'))).toBe(true);
            expect(TimeValue.fromHMS(1, 2, 3).equals(new TimeValue('01:02:03.1'))).toBe(false);
        });
    });
});
