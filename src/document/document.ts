// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {DEFAULT_LANGUAGE, ID_KEY, RESERVED_KEYS, REV_KEY} from '../constant';
import {InvalidStateError, NotFoundError} from '../errors';
import {RawDocument, RawValue, isRawDocument, readKey} from '../raw';
import {overlay, populate} from '../schema/registry';
import {RecordType, Schema} from '../schema/schema';
import type {FieldMap, FieldValues, Overlay} from '../schema/types';
import type {DocumentStore, RowWrapper, ViewParams, ViewRow} from './store';
import {View, ViewDefinition} from './view';

export type ViewMap = Readonly<Record<string, View>>;

export type NoViews = Record<never, View>;

export type DocumentValues<F extends FieldMap> = FieldValues<F> & { id?: string };

export type QueryOptions = ViewParams & {
    /** Resolve every row to its full stored document instead of its emitted value. */
    eager?: boolean;
    language?: string;
};

export type ViewQueryOptions = ViewParams & { eager?: boolean };

/**
 * A top-level record with a store-assigned identity and revision.
 */
export class Document<F extends FieldMap = FieldMap> extends Schema<F> {
    declare readonly type: DocumentType<F, ViewMap>;

    constructor(type: DocumentType<F, ViewMap>, data: RawDocument) {
        super(type, data);
    }

    get id(): string | null {
        return readIdentity(this.data, ID_KEY);
    }

    /**
     * Assignable once, while the record has no identity yet.
     */
    set id(value: string) {
        if (this.id !== null) {
            throw new InvalidStateError(`id can only be set on new documents, this one is ${JSON.stringify(this.id)}`);
        }
        this.data[ID_KEY] = value;
    }

    get rev(): string | null {
        return readIdentity(this.data, REV_KEY);
    }

    /**
     * Raw entries, identity first.
     */
    items(): Array<[string, RawValue]> {
        const entries: Array<[string, RawValue]> = [];
        const id = this.id;
        const rev = this.rev;
        if (id !== null) {
            entries.push([ID_KEY, id]);
        }
        if (rev !== null) {
            entries.push([REV_KEY, rev]);
        }
        for (const [key, value] of Object.entries(this.data)) {
            if (!RESERVED_KEYS.includes(key)) {
                entries.push([key, value]);
            }
        }
        return entries;
    }

    /**
     * Persists the record. A new record is re-read after creation so the backing
     * document carries everything the store assigned.
     */
    async store(db: DocumentStore): Promise<this> {
        const id = this.id;
        if (id !== null) {
            await db.upsert(id, this.data);
            return this;
        }

        const created = await db.create(this.data);
        const fetched = await db.get(created);
        if (fetched === null) {
            throw new NotFoundError(created);
        }
        this.data = fetched;
        return this;
    }

    toString(): string {
        const rest: RawDocument = {};
        for (const [key, value] of Object.entries(this.data)) {
            if (!RESERVED_KEYS.includes(key)) {
                rest[key] = value;
            }
        }
        return `<${this.type.name} ${JSON.stringify(this.id)}@${JSON.stringify(this.rev)} ${JSON.stringify(rest)}>`;
    }
}

export class DocumentType<F extends FieldMap, V extends ViewMap = NoViews> extends RecordType<F, Document<F>> {
    readonly views: V;

    protected constructor(name: string, fields: F, views: V) {
        super(name, fields);
        for (const [attribute, view] of Object.entries(views)) {
            view.bind(attribute);
        }
        this.views = {...views};
        Object.freeze(this.views);
    }

    static define<F extends FieldMap>(name: string, fields: F): DocumentType<F>;
    static define<F extends FieldMap, V extends ViewMap>(name: string, fields: F, views: V): DocumentType<F, V>;
    static define<F extends FieldMap, V extends ViewMap>(name: string, fields: F, views?: V): DocumentType<F, V> | DocumentType<F> {
        return views === undefined ? new DocumentType(name, fields, {}) : new DocumentType(name, fields, views);
    }

    /**
     * Declares a derived document type inheriting every field and view of this one.
     */
    extend<G extends FieldMap>(name: string, fields: G): DocumentType<Overlay<F, G>, V>;
    extend<G extends FieldMap, W extends ViewMap>(name: string, fields: G, views: W): DocumentType<Overlay<F, G>, Overlay<V, W>>;
    extend<G extends FieldMap, W extends ViewMap>(
        name: string,
        fields: G,
        views?: W,
    ): DocumentType<Overlay<F, G>, V> | DocumentType<Overlay<F, G>, Overlay<V, W>> {
        const registry = overlay(this.fields, fields);
        return views === undefined
            ? new DocumentType(name, registry, this.views)
            : new DocumentType(name, registry, overlay(this.views, views));
    }

    /**
     * A fresh document; `values.id`, when given, becomes its identity.
     */
    create(values: DocumentValues<F> = {}): Document<F> {
        const {id, ...fieldValues} = values;
        const record = this.instantiate({});
        populate(record, this.fields, fieldValues);
        if (typeof id === 'string') {
            record.id = id;
        }
        return record;
    }

    async load(db: DocumentStore, id: string): Promise<Document<F> | null> {
        const raw = await db.get(id);
        return raw === null ? null : this.wrap(raw);
    }

    /**
     * Runs an ad-hoc map/reduce query. Unless `eager` is set, each row becomes a
     * document made of its emitted value.
     */
    query(
        db: DocumentStore,
        mapFun: string,
        reduceFun?: string,
        options: QueryOptions = {},
    ): Promise<Array<Document<F> | null>> {
        const {eager = false, language = DEFAULT_LANGUAGE, ...params} = options;
        return db.query(mapFun, reduceFun, language, this.rowWrapper(db, eager), params);
    }

    view(db: DocumentStore, name: string, options: ViewQueryOptions = {}): Promise<Array<Document<F> | null>> {
        const {eager = false, ...params} = options;
        return db.view(name, this.rowWrapper(db, eager), params);
    }

    viewDefinition<K extends keyof V & string>(attribute: K): ViewDefinition<Document<F>> {
        return this.views[attribute].definition((row) => isRawDocument(row.doc) ? this.wrap(row.doc) : this.wrapValue(row));
    }

    protected instantiate(data: RawDocument): Document<F> {
        return new Document(this, data);
    }

    private rowWrapper(db: DocumentStore, eager: boolean): RowWrapper<Document<F> | null> {
        if (!eager) {
            return (row) => this.wrapValue(row);
        }
        return async (row) => {
            if (isRawDocument(row.doc)) {
                return this.wrap(row.doc);
            }
            if (row.id === null) {
                return null;
            }
            const loaded = await this.load(db, row.id);
            if (loaded === null) {
                console.warn(`${this.name}: view row ${JSON.stringify(row.id)} refers to a missing document`);
            }
            return loaded;
        };
    }

    private wrapValue(row: ViewRow): Document<F> {
        const data: RawDocument = isRawDocument(row.value) ? {...row.value} : {};
        if (row.id !== null) {
            data[ID_KEY] = row.id;
        }
        return this.wrap(data);
    }
}

function readIdentity(data: RawDocument, key: string): string | null {
    const value = readKey(data, key);
    if (value === undefined || value === null) {
        return null;
    }
    return typeof value === 'string' ? value : JSON.stringify(value);
}
