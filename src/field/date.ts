// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {RawValue} from '../raw';
import {DateValue} from '../value';
import {Field} from './field';

/**
 * Schema field for calendar dates, stored as `YYYY-MM-DD`.
 * A `Date` is stored as its UTC calendar date.
 */
export class DateField extends Field<DateValue, DateValue | Date> {
    readonly kind = 'date';

    decode(raw: RawValue): DateValue {
        if (typeof raw === 'string') {
            const parsed = DateValue.tryParse(raw);
            if (parsed) {
                return parsed;
            }
        }
        throw this.malformed(raw);
    }

    encode(value: DateValue | Date): RawValue {
        if (value instanceof DateValue) {
            return value.toString();
        }
        return new DateValue(value).toString();
    }
}
