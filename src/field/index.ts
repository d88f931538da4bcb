// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

export {Field} from './field';
export type {DefaultValue, FieldOptions} from './field';
export {BooleanField} from './boolean';
export {CollectionProxy} from './collection';
export type {ListLookup} from './collection';
export {DateField} from './date';
export {DateTimeField} from './datetime';
export {DecimalField} from './decimal';
export {DictField} from './dict';
export {FloatField} from './float';
export {IntegerField} from './integer';
export {ListField} from './list';
export type {ListFieldOptions} from './list';
export {LongField} from './long';
export {TextField} from './text';
export {TimeField} from './time';
