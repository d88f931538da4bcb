// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

export {Document, DocumentType} from './document';
export type {DocumentValues, NoViews, QueryOptions, ViewMap, ViewQueryOptions} from './document';
export type {DocumentStore, RowWrapper, ViewParams, ViewRow} from './store';
export {View, ViewDefinition} from './view';
export type {ViewOptions} from './view';
