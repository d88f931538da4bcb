// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import type {RawDocument, RawValue} from '../raw';

/**
 * One result row of a map/reduce query. Reduced rows carry no id.
 */
export interface ViewRow {
    id: string | null;
    key: RawValue;
    value: RawValue;
    doc?: RawDocument | null;
}

export type RowWrapper<T> = (row: ViewRow) => T | Promise<T>;

/**
 * Store-specific query parameters (`key`, `startkey`, `include_docs`, ...),
 * passed through untouched.
 */
export type ViewParams = { [key: string]: RawValue | undefined };

/**
 * The backing document store. Implementations own ids, revisions and index
 * evaluation; failures are propagated to the caller as-is.
 */
export interface DocumentStore {
    get(id: string): Promise<RawDocument | null>;

    /** Persists a new record and resolves to the id the store assigned. */
    create(data: RawDocument): Promise<string>;

    upsert(id: string, data: RawDocument): Promise<void>;

    query<T>(
        mapFun: string,
        reduceFun: string | undefined,
        language: string,
        wrapper: RowWrapper<T>,
        params: ViewParams,
    ): Promise<T[]>;

    /** Runs a stored index addressed as `design/name`. */
    view<T>(name: string, wrapper: RowWrapper<T>, params: ViewParams): Promise<T[]>;
}
