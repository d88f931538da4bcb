// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {DEFAULT_LANGUAGE} from '../constant';
import {InvalidStateError} from '../errors';
import type {DocumentStore, RowWrapper, ViewParams} from './store';

export interface ViewOptions {
    reduceFun?: string;
    /** Index name inside the design document; defaults to the attribute the view is declared under. */
    name?: string;
    language?: string;
    /** Parameters every execution starts from. */
    defaults?: ViewParams;
}

/**
 * A server-side index declared on a document type.
 */
export class View {
    readonly design: string;
    readonly mapFun: string;
    readonly reduceFun?: string;
    readonly language: string;
    readonly defaults: Readonly<ViewParams>;

    private viewName?: string;

    constructor(design: string, mapFun: string, options: ViewOptions = {}) {
        this.design = design;
        this.mapFun = mapFun;
        this.reduceFun = options.reduceFun;
        this.language = options.language ?? DEFAULT_LANGUAGE;
        this.defaults = Object.freeze({...options.defaults});
        this.viewName = options.name;
    }

    get name(): string {
        if (this.viewName === undefined) {
            throw new InvalidStateError(`view in design "${this.design}" is not bound to an attribute`);
        }
        return this.viewName;
    }

    bind(attribute: string): this {
        if (this.viewName === undefined) {
            this.viewName = attribute;
        }
        return this;
    }

    definition<T>(wrapper: RowWrapper<T>): ViewDefinition<T> {
        return new ViewDefinition(this.design, this.name, this.mapFun, this.reduceFun, this.language, this.defaults, wrapper);
    }
}

/**
 * A deferred query against a stored index. Nothing touches the store until
 * `execute` is called.
 */
export class ViewDefinition<T> {
    constructor(
        readonly design: string,
        readonly name: string,
        readonly mapFun: string,
        readonly reduceFun: string | undefined,
        readonly language: string,
        readonly defaults: Readonly<ViewParams>,
        readonly wrapper: RowWrapper<T>,
    ) {
    }

    get path(): string {
        return `${this.design}/${this.name}`;
    }

    execute(db: DocumentStore, params: ViewParams = {}): Promise<T[]> {
        return db.view(this.path, this.wrapper, {...this.defaults, ...params});
    }

    toString(): string {
        return `<ViewDefinition '_view/${this.path}'>`;
    }
}
