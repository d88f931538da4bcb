// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

/**
 * The untyped tree a document store persists and transmits.
 */
export type RawValue = null | boolean | number | string | RawDocument | RawValue[];

export interface RawDocument {
    [key: string]: RawValue;
}

/**
 * Anything that owns a raw backing document. Fields read and write through it.
 */
export interface RawHolder {
    unwrap(): RawDocument;
}

export function isRawDocument(value: RawValue | undefined): value is RawDocument {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function hasKey(data: RawDocument, key: string): boolean {
    return Object.prototype.hasOwnProperty.call(data, key);
}

/**
 * Own-key lookup; inherited members of Object.prototype never count as stored values.
 */
export function readKey(data: RawDocument, key: string): RawValue | undefined {
    return hasKey(data, key) ? data[key] : undefined;
}

export function describeRaw(value: RawValue | undefined): string {
    if (value === undefined) {
        return 'undefined';
    }
    return JSON.stringify(value);
}

export function rawEquals(a: RawValue, b: RawValue): boolean {
    return compareRaw(a, b) === 0;
}

function rank(value: RawValue): number {
    if (value === null) {
        return 0;
    }
    if (value === false) {
        return 1;
    }
    if (value === true) {
        return 2;
    }
    if (typeof value === 'number') {
        return 3;
    }
    if (typeof value === 'string') {
        return 4;
    }
    return Array.isArray(value) ? 5 : 6;
}

/**
 * Total order over raw values, in document-store view collation order:
 * null, false, true, numbers, strings, arrays (element-wise), then objects
 * (entry-wise, in key order).
 */
export function compareRaw(a: RawValue, b: RawValue): number {
    const rankA = rank(a);
    const rankB = rank(b);
    if (rankA !== rankB) {
        return rankA < rankB ? -1 : 1;
    }

    if (typeof a === 'number' && typeof b === 'number') {
        return a === b ? 0 : (a < b ? -1 : 1);
    }
    if (typeof a === 'string' && typeof b === 'string') {
        return a === b ? 0 : (a < b ? -1 : 1);
    }
    if (Array.isArray(a) && Array.isArray(b)) {
        return compareSequences(a, b);
    }
    if (isRawDocument(a) && isRawDocument(b)) {
        const entriesA = Object.entries(a);
        const entriesB = Object.entries(b);
        const length = Math.min(entriesA.length, entriesB.length);
        for (let i = 0; i < length; i++) {
            const byKey = compareRaw(entriesA[i][0], entriesB[i][0]);
            if (byKey !== 0) {
                return byKey;
            }
            const byValue = compareRaw(entriesA[i][1], entriesB[i][1]);
            if (byValue !== 0) {
                return byValue;
            }
        }
        return entriesA.length === entriesB.length ? 0 : (entriesA.length < entriesB.length ? -1 : 1);
    }
    // null, false and true are alone in their rank
    return 0;
}

function compareSequences(a: RawValue[], b: RawValue[]): number {
    const length = Math.min(a.length, b.length);
    for (let i = 0; i < length; i++) {
        const result = compareRaw(a[i], b[i]);
        if (result !== 0) {
            return result;
        }
    }
    return a.length === b.length ? 0 : (a.length < b.length ? -1 : 1);
}
