// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

export const ID_KEY = '_id';
export const REV_KEY = '_rev';

export const RESERVED_KEYS: readonly string[] = [ID_KEY, REV_KEY];

export const DEFAULT_LANGUAGE = 'javascript';

export const ANONYMOUS_SCHEMA_NAME = 'AnonymousStruct';
