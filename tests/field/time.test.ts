// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {describe, expect, it} from 'vitest';
import {TimeField, TimeValue} from '../../src';
import {holder} from '../support/holder';

describe('TimeField', () => {
    const field = new TimeField().bind('opens');

    it('should round-trip whole seconds', () => {
        const record = holder();
        field.set(record, TimeValue.fromHMS(9, 5, 0));
        expect(record.unwrap()).toEqual({opens: '09:05:00'});
        expect(field.get(record)?.equals(TimeValue.fromHMS(9, 5, 0))).toBe(true);
    });

    it('should drop fractional seconds on write', () => {
        expect(field.encode(new TimeValue('10:30:45.999'))).toBe('10:30:45');
    });

    it('should store a Date as its UTC time of day', () => {
        expect(field.encode(new Date('2024-03-15T08:09:10.250Z'))).toBe('08:09:10');
    });

    it('should ignore fractions when reading', () => {
        expect(field.decode('10:30:45.999').toString()).toBe('10:30:45');
    });

    it('should reject malformed literals', () => {
        expect(() => field.decode('25:00:00')).toThrow('[MALFORMED_LITERAL] Invalid time "25:00:00"');
        expect(() => field.decode(3600)).toThrow('[MALFORMED_LITERAL] Invalid time 3600');
    });
});
