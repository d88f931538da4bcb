// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import type {Field} from '../field/field';

/**
 * Attribute name to Field, as declared on a schema type.
 */
export type FieldMap = Readonly<Record<string, Field<unknown, unknown>>>;

/**
 * What reading the field produces.
 */
export type ValueOf<F> = F extends Field<infer T, never> ? T : never;

/**
 * What writing the field accepts.
 */
export type InputOf<F> = F extends Field<unknown, infer I> ? I : never;

/**
 * Keyword values accepted when constructing a fresh record.
 */
export type FieldValues<F extends FieldMap> = {
    [K in keyof F]?: InputOf<F[K]> | null;
};

/**
 * A derived registry: own declarations replace inherited ones of the same attribute.
 */
export type Overlay<F, G> = Omit<F, keyof G> & G;
