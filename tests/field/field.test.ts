// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB
import {describe, expect, it} from 'vitest';
import {InvalidStateError, IntegerField, TextField} from '../../src';
import {holder} from '../support/holder';

describe('Field', () => {
    describe('binding', () => {
        it('should adopt the attribute name when unnamed', () => {
            const field = new TextField().bind('title');
            expect(field.name).toBe('title');
            expect(field.isBound).toBe(true);
        });

        it('should keep an explicit name', () => {
            const field = new IntegerField({name: 'raw_age'}).bind('age');
            expect(field.name).toBe('raw_age');
        });

        it('should keep the first attribute it is bound to', () => {
            const field = new TextField().bind('first').bind('second');
            expect(field.name).toBe('first');
        });

        it('should fail to access an unbound field', () => {
            const field = new TextField();
            expect(field.isBound).toBe(false);
            expect(() => field.get(holder())).toThrow(InvalidStateError);
            expect(() => field.get(holder())).toThrow('[INVALID_STATE] text field is not bound to an attribute');
        });
    });

    describe('get', () => {
        it('should return null for an absent key without a default', () => {
            expect(new TextField().bind('title').get(holder())).toBeNull();
        });

        it('should return the default for absent and null keys', () => {
            const field = new TextField({default: 'untitled'}).bind('title');
            expect(field.get(holder())).toBe('untitled');
            expect(field.get(holder({title: null}))).toBe('untitled');
        });

        it('should call a default producer on every read', () => {
            let calls = 0;
            const field = new IntegerField({default: () => ++calls}).bind('seq');
            const record = holder();
            expect(field.get(record)).toBe(1);
            expect(field.get(record)).toBe(2);
            expect(record.unwrap()).toEqual({});
        });

        it('should not read inherited object members', () => {
            expect(new TextField().bind('toString').get(holder())).toBeNull();
        });
    });

    describe('set', () => {
        it('should store the encoded value under the field name', () => {
            const record = holder();
            new IntegerField({name: 'n'}).bind('count').set(record, 7.8);
            expect(record.unwrap()).toEqual({n: 7});
        });

        it('should store null directly', () => {
            const record = holder({title: 'draft'});
            new TextField().bind('title').set(record, null);
            expect(record.unwrap()).toEqual({title: null});
        });
    });
});
