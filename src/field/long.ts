// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {RawValue} from '../raw';
import {Field} from './field';

const INTEGER = /^[+-]?\d+$/;

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * Schema field for long integer values.
 *
 * Stored as a JSON number while it fits in a double without loss, and as a
 * decimal string beyond that. Other readers of the store see a string, not a
 * number, for those values.
 */
export class LongField extends Field<bigint, bigint | number> {
    readonly kind = 'long';

    decode(raw: RawValue): bigint {
        if (typeof raw === 'number' && Number.isFinite(raw)) {
            return BigInt(Math.trunc(raw));
        }
        if (typeof raw === 'string' && INTEGER.test(raw.trim())) {
            return BigInt(raw.trim());
        }
        throw this.malformed(raw);
    }

    encode(value: bigint | number): RawValue {
        if (typeof value === 'number' && !Number.isFinite(value)) {
            throw new RangeError(`Cannot store a non-finite ${this.kind} value`);
        }
        const long = typeof value === 'bigint' ? value : BigInt(Math.trunc(value));
        if (long < MIN_SAFE || long > MAX_SAFE) {
            return long.toString();
        }
        return Number(long);
    }
}
