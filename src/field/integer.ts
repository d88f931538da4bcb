// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {RawValue} from '../raw';
import {Field} from './field';

const INTEGER = /^[+-]?\d+$/;

/**
 * Schema field for integer values. Fractional numbers are truncated toward zero.
 */
export class IntegerField extends Field<number> {
    readonly kind = 'integer';

    decode(raw: RawValue): number {
        if (typeof raw === 'number' && Number.isFinite(raw)) {
            return Math.trunc(raw);
        }
        if (typeof raw === 'string' && INTEGER.test(raw.trim())) {
            return parseInt(raw, 10);
        }
        throw this.malformed(raw);
    }

    encode(value: number): RawValue {
        if (!Number.isFinite(value)) {
            throw new RangeError(`Cannot store a non-finite ${this.kind} value`);
        }
        return Math.trunc(value);
    }
}
