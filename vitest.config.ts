// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {defineConfig} from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        testTimeout: 1000,
        hookTimeout: 1000,
        teardownTimeout: 1000,

        include: [
            'tests/**/*.{test,spec}.ts',
        ],
        exclude: [
            'node_modules/**',
            'dist/**',
        ],

        env: {
            NODE_ENV: 'test',
        }
    },

    esbuild: {
        target: 'es2022'
    }
});
