// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {RawValue} from '../raw';
import {TimeValue} from '../value';
import {Field} from './field';

/**
 * Schema field for times of day, stored as `HH:MM:SS`.
 * Writes drop fractional seconds; a `Date` is written as its UTC time of day.
 */
export class TimeField extends Field<TimeValue, TimeValue | Date> {
    readonly kind = 'time';

    decode(raw: RawValue): TimeValue {
        if (typeof raw === 'string') {
            const parsed = TimeValue.tryParse(raw.split('.', 1)[0]);
            if (parsed) {
                return parsed;
            }
        }
        throw this.malformed(raw);
    }

    encode(value: TimeValue | Date): RawValue {
        const time = value instanceof TimeValue ? value : TimeValue.fromDate(value);
        return time.truncate().toString();
    }
}
