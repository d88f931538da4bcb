// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {RawValue} from '../raw';
import {Field} from './field';

export class FloatField extends Field<number> {
    readonly kind = 'float';

    decode(raw: RawValue): number {
        if (typeof raw === 'number') {
            return raw;
        }
        if (typeof raw === 'string' && raw.trim() !== '') {
            const num = Number(raw);
            if (!Number.isNaN(num)) {
                return num;
            }
        }
        throw this.malformed(raw);
    }

    encode(value: number): RawValue {
        if (!Number.isFinite(value)) {
            throw new RangeError(`Cannot store a non-finite ${this.kind} value`);
        }
        return value;
    }
}
