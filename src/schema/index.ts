// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

export {RecordType, Schema, SchemaType} from './schema';
export {buildRegistry, overlay} from './registry';
export type {FieldMap, FieldValues, InputOf, Overlay, ValueOf} from './types';
