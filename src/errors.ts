// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {describeRaw, RawValue} from './raw';

export type SchemaErrorCode = 'MALFORMED_LITERAL' | 'INVALID_STATE' | 'NOT_FOUND';

export class SchemaError extends Error {
    public readonly code: SchemaErrorCode;

    constructor(code: SchemaErrorCode, message: string) {
        super(`[${code}] ${message}`);

        this.name = 'SchemaError';
        this.code = code;

        // Required for instanceof checks to work properly
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * A raw value that cannot be read as the kind its field declares.
 * Raised only when the field is actually read.
 */
export class MalformedLiteralError extends SchemaError {
    public readonly kind: string;
    public readonly literal: RawValue;

    constructor(kind: string, literal: RawValue) {
        super('MALFORMED_LITERAL', `Invalid ${kind} ${describeRaw(literal)}`);
        this.name = 'MalformedLiteralError';
        this.kind = kind;
        this.literal = literal;
    }
}

export class InvalidStateError extends SchemaError {
    constructor(message: string) {
        super('INVALID_STATE', message);
        this.name = 'InvalidStateError';
    }
}

export class NotFoundError extends SchemaError {
    public readonly id: string;

    constructor(id: string) {
        super('NOT_FOUND', `No document found with id ${JSON.stringify(id)}`);
        this.name = 'NotFoundError';
        this.id = id;
    }
}
