// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {RawValue} from '../raw';
import {DecimalValue} from '../value';
import {Field} from './field';

/**
 * Schema field for decimal values, stored as the numeral string.
 */
export class DecimalField extends Field<DecimalValue, DecimalValue | string | number> {
    readonly kind = 'decimal';

    decode(raw: RawValue): DecimalValue {
        if (typeof raw === 'string') {
            const parsed = DecimalValue.tryParse(raw);
            if (parsed) {
                return parsed;
            }
        } else if (typeof raw === 'number' && Number.isFinite(raw)) {
            return new DecimalValue(raw);
        }
        throw this.malformed(raw);
    }

    encode(value: DecimalValue | string | number): RawValue {
        if (value instanceof DecimalValue) {
            return value.toString();
        }
        return new DecimalValue(value).toString();
    }
}
