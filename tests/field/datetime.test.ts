// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {describe, expect, it} from 'vitest';
import {DateTimeField, DateValue} from '../../src';
import {holder} from '../support/holder';

describe('DateTimeField', () => {
    const field = new DateTimeField().bind('posted');

    it('should store UTC text truncated to whole seconds', () => {
        const record = holder();
        field.set(record, new Date('2024-03-15T10:30:45.678Z'));
        expect(record.unwrap()).toEqual({posted: '2024-03-15T10:30:45Z'});
        expect(field.get(record)?.toISOString()).toBe('2024-03-15T10:30:45.000Z');
    });

    it('should round-trip values already at whole seconds', () => {
        const value = new Date('1999-12-31T23:59:59Z');
        expect(field.decode(field.encode(value)).getTime()).toBe(value.getTime());
    });

    it('should truncate instants before the epoch downwards', () => {
        expect(field.encode(new Date(-1))).toBe('1969-12-31T23:59:59Z');
    });

    it('should accept dates and epoch milliseconds', () => {
        expect(field.encode(DateValue.fromYMD(2024, 3, 15))).toBe('2024-03-15T00:00:00Z');
        expect(field.encode(0)).toBe('1970-01-01T00:00:00Z');
    });

    it('should ignore fractions and a missing zone designator when reading', () => {
        expect(field.decode('2024-03-15T10:30:45.123456Z').toISOString()).toBe('2024-03-15T10:30:45.000Z');
        expect(field.decode('2024-03-15T10:30:45').toISOString()).toBe('2024-03-15T10:30:45.000Z');
    });

    it('should reject malformed literals', () => {
        expect(() => field.decode('2024-02-30T00:00:00Z')).toThrow('[MALFORMED_LITERAL] Invalid date/time "2024-02-30T00:00:00Z"');
        expect(() => field.decode('2024-03-15 10:30:45')).toThrow('[MALFORMED_LITERAL] Invalid date/time "2024-03-15 10:30:45"');
        expect(() => field.decode('2024-03-15T24:00:00Z')).toThrow('[MALFORMED_LITERAL] Invalid date/time "2024-03-15T24:00:00Z"');
    });

    it('should refuse to store an invalid Date', () => {
        expect(() => field.encode(new Date(NaN))).toThrow('Cannot store an invalid date/time value');
    });
});
