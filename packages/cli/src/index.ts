#!/usr/bin/env node
/**
 * billsort CLI entry point.
 *
 * The CLI owns all file I/O and console output; the learning engine in
 * @billsort/core stays headless.
 */

import { createProgram } from './program.js';

createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
        console.error('Unexpected error:', err instanceof Error ? err.message : String(err));
        process.exit(1);
    });
