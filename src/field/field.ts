// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {InvalidStateError, MalformedLiteralError} from '../errors';
import {RawHolder, RawValue, readKey} from '../raw';

export type DefaultValue<T> = T | (() => T);

export interface FieldOptions<T> {
    /** Raw key to map to; defaults to the attribute the field is declared under. */
    name?: string;
    /** Returned by reads of an absent key. A function is called on every such read. */
    default?: DefaultValue<T>;
}

function isProducer<T>(value: DefaultValue<T>): value is () => T {
    return typeof value === 'function';
}

/**
 * Maps one attribute between its raw wire encoding and a typed value.
 *
 * `T` is what reads produce, `I` is what writes accept.
 */
export abstract class Field<T, I = T> {
    abstract readonly kind: string;

    private fieldName?: string;
    protected readonly defaultValue?: DefaultValue<T>;

    constructor(options: FieldOptions<T> = {}) {
        this.fieldName = options.name;
        this.defaultValue = options.default;
    }

    get name(): string {
        if (this.fieldName === undefined) {
            throw new InvalidStateError(`${this.kind} field is not bound to an attribute`);
        }
        return this.fieldName;
    }

    get isBound(): boolean {
        return this.fieldName !== undefined;
    }

    /**
     * Adopts the attribute name unless a name was already assigned.
     */
    bind(attribute: string): this {
        if (this.fieldName === undefined) {
            this.fieldName = attribute;
        }
        return this;
    }

    get(record: RawHolder): T | null {
        const raw = readKey(record.unwrap(), this.name);
        if (raw !== undefined && raw !== null) {
            return this.decode(raw);
        }
        return this.fallback();
    }

    set(record: RawHolder, value: I | null): void {
        record.unwrap()[this.name] = value === null ? null : this.encode(value);
    }

    abstract decode(raw: RawValue): T;

    abstract encode(value: I): RawValue;

    protected fallback(): T | null {
        const value = this.defaultValue;
        if (value === undefined) {
            return null;
        }
        return isProducer(value) ? value() : value;
    }

    protected malformed(raw: RawValue): MalformedLiteralError {
        return new MalformedLiteralError(this.kind, raw);
    }
}
