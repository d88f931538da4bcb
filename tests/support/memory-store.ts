// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {v4 as uuidv4} from 'uuid';
import {
    DocumentStore,
    RawDocument,
    RawValue,
    RowWrapper,
    ViewParams,
    ViewRow,
    compareRaw,
    rawEquals,
} from '../../src';

export type Emit = (key: RawValue, value: RawValue) => void;
export type MapFunction = (doc: RawDocument, emit: Emit) => void;

/**
 * In-process document store. Map functions stand in for server-side source:
 * ad-hoc queries look theirs up by source text, stored views by `design/name`.
 * Supports the `key` and `include_docs` parameters and the `_count` reduction.
 */
export class MemoryStore implements DocumentStore {
    private readonly docs = new Map<string, RawDocument>();
    private readonly sources = new Map<string, MapFunction>();
    private readonly views = new Map<string, MapFunction>();

    register(source: string, map: MapFunction): this {
        this.sources.set(source, map);
        return this;
    }

    defineView(name: string, map: MapFunction): this {
        this.views.set(name, map);
        return this;
    }

    remove(id: string): void {
        this.docs.delete(id);
    }

    async get(id: string): Promise<RawDocument | null> {
        const doc = this.docs.get(id);
        return doc === undefined ? null : structuredClone(doc);
    }

    async create(data: RawDocument): Promise<string> {
        const id = typeof data._id === 'string' ? data._id : uuidv4();
        if (this.docs.has(id)) {
            throw new Error(`Document update conflict: ${id}`);
        }
        this.docs.set(id, {...structuredClone(data), _id: id, _rev: nextRevision(undefined)});
        return id;
    }

    async upsert(id: string, data: RawDocument): Promise<void> {
        const current = this.docs.get(id);
        this.docs.set(id, {...structuredClone(data), _id: id, _rev: nextRevision(current)});
    }

    async query<T>(
        mapFun: string,
        reduceFun: string | undefined,
        language: string,
        wrapper: RowWrapper<T>,
        params: ViewParams,
    ): Promise<T[]> {
        if (language !== 'javascript') {
            throw new Error(`Unsupported query language: ${language}`);
        }
        const map = this.sources.get(mapFun);
        if (map === undefined) {
            throw new Error(`Unknown map function: ${mapFun}`);
        }
        return this.run(map, reduceFun, wrapper, params);
    }

    async view<T>(name: string, wrapper: RowWrapper<T>, params: ViewParams): Promise<T[]> {
        const map = this.views.get(name);
        if (map === undefined) {
            throw new Error(`Unknown view: ${name}`);
        }
        return this.run(map, undefined, wrapper, params);
    }

    private run<T>(map: MapFunction, reduceFun: string | undefined, wrapper: RowWrapper<T>, params: ViewParams): Promise<T[]> {
        let rows: ViewRow[] = [];
        const ids = [...this.docs.keys()].sort();
        for (const id of ids) {
            const doc = this.docs.get(id);
            if (doc !== undefined) {
                map(structuredClone(doc), (key, value) => rows.push({id, key, value}));
            }
        }
        rows.sort((a, b) => compareRaw(a.key, b.key) || compareRaw(a.id, b.id));

        const key = params.key;
        if (key !== undefined) {
            rows = rows.filter(row => rawEquals(row.key, key));
        }
        if (reduceFun === '_count') {
            rows = [{id: null, key: null, value: rows.length}];
        } else if (params.include_docs === true) {
            rows = rows.map(row => ({...row, doc: this.attached(row.id)}));
        }
        return Promise.all(rows.map(row => wrapper(row)));
    }

    private attached(id: string | null): RawDocument | null {
        const doc = id === null ? undefined : this.docs.get(id);
        return doc === undefined ? null : structuredClone(doc);
    }
}

function nextRevision(current: RawDocument | undefined): string {
    const generation = current === undefined ? 0 : parseInt(String(current._rev), 10);
    return `${generation + 1}-${uuidv4().replace(/-/g, '')}`;
}
