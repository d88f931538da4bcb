// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

export * from './constant';
export * from './errors';
export * from './raw';
export * from './value';
export * from './field';
export * from './schema';
export * from './document';
