// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {RawValue} from '../raw';
import {Field} from './field';

/**
 * Schema field for string values. Numbers and booleans are read as their text.
 */
export class TextField extends Field<string> {
    readonly kind = 'text';

    decode(raw: RawValue): string {
        if (typeof raw === 'string') {
            return raw;
        }
        if (typeof raw === 'number' || typeof raw === 'boolean') {
            return String(raw);
        }
        throw this.malformed(raw);
    }

    encode(value: string): RawValue {
        return value;
    }
}
