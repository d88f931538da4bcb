// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {RawHolder} from '../raw';
import type {FieldMap, Overlay} from './types';

/**
 * Names every unnamed field after its attribute and freezes the table.
 * Runs once, when a schema type is defined.
 */
export function buildRegistry<F extends FieldMap>(fields: F): F {
    const table: FieldMap = fields;
    for (const [attribute, field] of Object.entries(table)) {
        field.bind(attribute);
    }
    const registry: F = {...fields};
    Object.freeze(registry);
    return registry;
}

/**
 * Parent entries first, then the child's own, replacing same-named parent entries.
 */
export function overlay<F extends object, G extends object>(parent: F, own: G): Overlay<F, G> {
    return {...parent, ...own};
}

/**
 * Sets every supplied field through its converter; unsupplied fields are read once
 * so their defaults are computed, but nothing is written for them.
 */
export function populate(record: RawHolder, fields: FieldMap, values: { readonly [key: string]: unknown }): void {
    for (const [attribute, field] of Object.entries(fields)) {
        const supplied = hasOwnValue(values, attribute) ? values[attribute] : undefined;
        if (supplied !== undefined) {
            field.set(record, supplied);
        } else {
            field.get(record);
        }
    }
}

function hasOwnValue(values: { readonly [key: string]: unknown }, key: string): boolean {
    return Object.prototype.hasOwnProperty.call(values, key);
}
