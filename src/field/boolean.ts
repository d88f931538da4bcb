// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {RawValue} from '../raw';
import {Field} from './field';

export class BooleanField extends Field<boolean> {
    readonly kind = 'boolean';

    decode(raw: RawValue): boolean {
        if (typeof raw === 'boolean') {
            return raw;
        }
        if (typeof raw === 'number') {
            return raw !== 0;
        }
        if (typeof raw === 'string') {
            const trimmed = raw.trim().toLowerCase();
            if (trimmed === 'true') {
                return true;
            }
            if (trimmed === 'false') {
                return false;
            }
        }
        throw this.malformed(raw);
    }

    encode(value: boolean): RawValue {
        return value;
    }
}
