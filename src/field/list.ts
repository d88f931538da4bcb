// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {RawHolder, RawValue, readKey} from '../raw';
import {RecordType, Schema} from '../schema/schema';
import type {FieldMap, FieldValues} from '../schema/types';
import {CollectionProxy} from './collection';
import {DictField} from './dict';
import {Field} from './field';

export interface ListFieldOptions {
    name?: string;
}

/**
 * Field type for sequences of another field's values.
 *
 * Reads return a {@link CollectionProxy} over the stored array itself. An absent
 * list reads as an empty proxy that stores an array in the record on its first
 * mutation, or adopts the one stored since, so reading alone never writes.
 */
export class ListField<T, I = T> extends Field<CollectionProxy<T, I>, Iterable<I> | CollectionProxy<T, I>> {
    readonly kind = 'list';
    readonly field: Field<T, I>;

    constructor(field: Field<T, I>, options: ListFieldOptions = {}) {
        super({name: options.name});
        this.field = field;
    }

    /**
     * A list of nested records of the given schema type.
     */
    static of<F extends FieldMap>(schema: RecordType<F, Schema<F>>, options: ListFieldOptions = {}): ListField<Schema<F>, Schema<F> | FieldValues<F>> {
        return new ListField(new DictField(schema), options);
    }

    get(record: RawHolder): CollectionProxy<T, I> {
        const data = record.unwrap();
        const name = this.name;
        const raw = readKey(data, name);
        if (raw !== undefined && raw !== null) {
            return this.decode(raw);
        }

        const find = (): RawValue[] | undefined => {
            const current = readKey(data, name);
            if (current === undefined || current === null) {
                return undefined;
            }
            if (!Array.isArray(current)) {
                throw this.malformed(current);
            }
            return current;
        };
        return new CollectionProxy({
            find,
            attach: () => {
                const stored = find();
                if (stored) {
                    return stored;
                }
                const list: RawValue[] = [];
                data[name] = list;
                return list;
            },
        }, this.field);
    }

    decode(raw: RawValue): CollectionProxy<T, I> {
        if (!Array.isArray(raw)) {
            throw this.malformed(raw);
        }
        return new CollectionProxy(raw, this.field);
    }

    encode(value: Iterable<I> | CollectionProxy<T, I>): RawValue {
        if (value instanceof CollectionProxy) {
            return value.unwrap().slice();
        }
        return Array.from(value, item => this.field.encode(item));
    }
}
