// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {RawValue, isRawDocument} from '../raw';
import {RecordType, Schema} from '../schema/schema';
import type {FieldMap, FieldValues} from '../schema/types';
import {Field, FieldOptions} from './field';

/**
 * Field type for nested mappings described by a schema of their own.
 *
 * Reads wrap the stored mapping in place; writes store a record's backing
 * mapping, or build one from plain values through the nested schema.
 */
export class DictField<F extends FieldMap> extends Field<Schema<F>, Schema<F> | FieldValues<F>> {
    readonly kind = 'dict';
    readonly schema: RecordType<F, Schema<F>>;

    constructor(schema: RecordType<F, Schema<F>>, options: FieldOptions<Schema<F>> = {}) {
        super(options);
        this.schema = schema;
    }

    decode(raw: RawValue): Schema<F> {
        if (!isRawDocument(raw)) {
            throw this.malformed(raw);
        }
        return this.schema.wrap(raw);
    }

    encode(value: Schema<F> | FieldValues<F>): RawValue {
        if (value instanceof Schema) {
            return value.unwrap();
        }
        return this.schema.create(value).unwrap();
    }
}
