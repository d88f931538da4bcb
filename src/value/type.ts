// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

export type Type =
    | "Date"
    | "Time"
    | "Decimal";

export abstract class Value {
    abstract readonly type: Type;

    public abstract equals(other: Value): boolean;
    public abstract toString(): string;
}
