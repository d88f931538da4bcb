// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {ANONYMOUS_SCHEMA_NAME} from '../constant';
import type {Field} from '../field/field';
import {RawDocument, RawHolder, RawValue, hasKey, readKey} from '../raw';
import {buildRegistry, overlay, populate} from './registry';
import type {FieldMap, FieldValues, Overlay} from './types';

/**
 * A schema descriptor: a name and a frozen attribute→Field registry, plus the
 * factories that produce records of it.
 */
export abstract class RecordType<F extends FieldMap, R extends Schema<F>> {
    readonly name: string;
    readonly fields: F;

    protected constructor(name: string, fields: F) {
        this.name = name;
        this.fields = buildRegistry(fields);
    }

    /**
     * A record backed by `raw` itself. No copy is made and no defaults are applied.
     */
    wrap(raw: RawDocument): R {
        return this.instantiate(raw);
    }

    /**
     * A fresh record. Supplied values go through their fields' setters; defaults of
     * the others are computed but never written to the backing document.
     */
    create(values: FieldValues<F> = {}): R {
        const record = this.instantiate({});
        populate(record, this.fields, values);
        return record;
    }

    field<K extends keyof F>(attribute: K): F[K] {
        return this.fields[attribute];
    }

    toString(): string {
        return `<${this.name} fields=[${Object.keys(this.fields).join(', ')}]>`;
    }

    protected abstract instantiate(data: RawDocument): R;
}

export class SchemaType<F extends FieldMap> extends RecordType<F, Schema<F>> {
    /**
     * Declares a named schema type.
     */
    static define<F extends FieldMap>(name: string, fields: F): SchemaType<F> {
        return new SchemaType(name, fields);
    }

    /**
     * Synthesizes an anonymous schema type, for nested structures that do not
     * warrant a name of their own.
     */
    static build<F extends FieldMap>(fields: F): SchemaType<F> {
        return new SchemaType(ANONYMOUS_SCHEMA_NAME, fields);
    }

    /**
     * Declares a derived type inheriting every field of this one.
     */
    extend<G extends FieldMap>(name: string, fields: G): SchemaType<Overlay<F, G>> {
        return new SchemaType(name, overlay(this.fields, fields));
    }

    protected instantiate(data: RawDocument): Schema<F> {
        return new Schema(this, data);
    }
}

/**
 * A structured record over one raw backing document.
 *
 * Typed access goes through Field converters (`get`/`set`). The map-like methods
 * (`has`, `getItem`, `setItem`, `deleteItem`, `keys`, iteration) work on the raw
 * keys directly, declared or not.
 */
export class Schema<F extends FieldMap = FieldMap> implements RawHolder, Iterable<string> {
    readonly type: RecordType<F, Schema<F>>;
    protected data: RawDocument;

    constructor(type: RecordType<F, Schema<F>>, data: RawDocument) {
        this.type = type;
        this.data = data;
    }

    /**
     * The live backing document, not a copy.
     */
    unwrap(): RawDocument {
        return this.data;
    }

    /**
     * Reads through `field`; whatever the field reads is returned unchanged.
     */
    get<R>(field: { get(record: RawHolder): R }): R {
        return field.get(this);
    }

    set<I>(field: Field<unknown, I>, value: NoInfer<I> | null): void {
        field.set(this, value);
    }

    has(key: string): boolean {
        return hasKey(this.data, key);
    }

    get size(): number {
        return Object.keys(this.data).length;
    }

    getItem(key: string): RawValue | undefined {
        return readKey(this.data, key);
    }

    setItem(key: string, value: RawValue): void {
        this.data[key] = value;
    }

    deleteItem(key: string): boolean {
        if (!this.has(key)) {
            return false;
        }
        delete this.data[key];
        return true;
    }

    keys(): IterableIterator<string> {
        return Object.keys(this.data)[Symbol.iterator]();
    }

    [Symbol.iterator](): IterableIterator<string> {
        return this.keys();
    }

    toString(): string {
        return `<${this.type.name} ${JSON.stringify(this.data)}>`;
    }
}
