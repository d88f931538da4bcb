// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {Type, Value} from "./type";

const NUMERAL = /^([+-]?)(\d+(?:\.\d*)?|\.\d+)(?:[eE]([+-]?\d+))?$/;

interface Normalized {
    negative: boolean;
    digits: string;
    exponent: number;
}

/**
 * An arbitrary-precision decimal kept as its numeral, so no digit is ever lost.
 */
export class DecimalValue implements Value {
    readonly type: Type = "Decimal" as const;
    public readonly value: string;

    constructor(value: string | number | bigint) {
        if (typeof value === 'number') {
            if (!Number.isFinite(value)) {
                throw new Error(`Decimal value must be finite, got ${value}`);
            }
            this.value = String(value);
        } else if (typeof value === 'bigint') {
            this.value = value.toString();
        } else {
            const trimmed = value.trim();
            if (!NUMERAL.test(trimmed)) {
                throw new Error(`Invalid decimal string: ${value}`);
            }
            this.value = trimmed;
        }
    }

    static parse(str: string): DecimalValue {
        const parsed = DecimalValue.tryParse(str);
        if (!parsed) {
            throw new Error(`Cannot parse "${str}" as Decimal`);
        }
        return parsed;
    }

    static tryParse(str: string): DecimalValue | null {
        return NUMERAL.test(str.trim()) ? new DecimalValue(str) : null;
    }

    valueOf(): string {
        return this.value;
    }

    toString(): string {
        return this.value;
    }

    /**
     * Nearest double; precision beyond 17 significant digits is lost
     */
    toNumber(): number {
        return Number(this.value);
    }

    /**
     * Numeric equality: "1.50" equals "1.5" and "15e-1"
     */
    equals(other: Value): boolean {
        if (!(other instanceof DecimalValue)) {
            return false;
        }
        const a = this.normalize();
        const b = other.normalize();
        return a.negative === b.negative && a.digits === b.digits && a.exponent === b.exponent;
    }

    private normalize(): Normalized {
        const match = this.value.match(NUMERAL);
        if (!match) {
            throw new Error(`Invalid decimal string: ${this.value}`);
        }
        const [integral, fraction = ''] = match[2].split('.');
        let digits = (integral + fraction).replace(/^0+/, '');
        let exponent = (match[3] ? parseInt(match[3], 10) : 0) - fraction.length;

        if (digits === '') {
            return {negative: false, digits: '0', exponent: 0};
        }
        while (digits.endsWith('0')) {
            digits = digits.slice(0, -1);
            exponent++;
        }
        return {negative: match[1] === '-', digits, exponent};
    }
}
