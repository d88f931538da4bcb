// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {RawValue, compareRaw, rawEquals} from '../raw';
import type {Field} from './field';

/**
 * Locates the raw array of a list that may not be stored yet.
 */
export interface ListLookup {
    /** The stored array, or undefined while there is none. */
    find(): RawValue[] | undefined;

    /** The stored array, storing an empty one first when there is none. */
    attach(): RawValue[];
}

/**
 * A lazy view over a raw array: every element is converted through `field` on
 * each access, and every write stores the converted form straight into the
 * array. Nothing is cached.
 *
 * Over a {@link ListLookup}, reads see an empty list until an array is stored,
 * and the first mutation stores one, or adopts the one another writer stored.
 *
 * Equality, ordering and string form are those of the raw array.
 */
export class CollectionProxy<T, I = T> implements Iterable<T> {
    readonly field: Field<T, I>;
    private list?: RawValue[];
    private readonly lookup?: ListLookup;

    constructor(source: RawValue[] | ListLookup, field: Field<T, I>) {
        if (Array.isArray(source)) {
            this.list = source;
        } else {
            this.lookup = source;
        }
        this.field = field;
    }

    get length(): number {
        return this.current().length;
    }

    isEmpty(): boolean {
        return this.current().length === 0;
    }

    /**
     * Negative indexes count from the end.
     */
    at(index: number): T {
        const list = this.current();
        return this.field.decode(list[resolve(list, index)]);
    }

    set(index: number, value: I): void {
        const position = resolve(this.current(), index);
        const encoded = this.field.encode(value);
        this.target()[position] = encoded;
    }

    delete(index: number): void {
        const position = resolve(this.current(), index);
        this.target().splice(position, 1);
    }

    append(value: I): void {
        const encoded = this.field.encode(value);
        this.target().push(encoded);
    }

    extend(values: Iterable<I>): void {
        for (const value of values) {
            this.append(value);
        }
    }

    *[Symbol.iterator](): IterableIterator<T> {
        for (let index = 0; index < this.current().length; index++) {
            yield this.at(index);
        }
    }

    /**
     * The live raw array; a detached empty array while nothing is stored.
     */
    unwrap(): RawValue[] {
        return this.current();
    }

    equals(other: CollectionProxy<unknown, never> | RawValue[]): boolean {
        return rawEquals(this.current(), toRaw(other));
    }

    compare(other: CollectionProxy<unknown, never> | RawValue[]): number {
        return compareRaw(this.current(), toRaw(other));
    }

    toString(): string {
        return JSON.stringify(this.current());
    }

    toJSON(): RawValue[] {
        return this.current();
    }

    private current(): RawValue[] {
        if (this.list) {
            return this.list;
        }
        return this.lookup?.find() ?? [];
    }

    private target(): RawValue[] {
        if (!this.list && this.lookup) {
            this.list = this.lookup.attach();
        }
        return this.current();
    }
}

function resolve(list: RawValue[], index: number): number {
    const position = index < 0 ? list.length + index : index;
    if (!Number.isInteger(position) || position < 0 || position >= list.length) {
        throw new RangeError(`Index ${index} out of range for list of length ${list.length}`);
    }
    return position;
}

function toRaw(value: CollectionProxy<unknown, never> | RawValue[]): RawValue[] {
    return Array.isArray(value) ? value : value.unwrap();
}
