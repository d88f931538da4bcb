// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

export {DateValue, utcDate} from './date';
export {DecimalValue} from './decimal';
export {TimeValue} from './time';
export {Value} from './type';
export type {Type} from './type';
