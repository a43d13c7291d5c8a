import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

const repoFile = (path: string): string => fileURLToPath(new URL(`../../../${path}`, import.meta.url));

function readJson(path: string): Record<string, unknown> {
    return JSON.parse(readFileSync(repoFile(path), 'utf8'));
}

interface BuildConfig {
    compilerOptions: { rootDir: string; outDir: string; composite: boolean };
    include: string[];
    references?: { path: string }[];
}

function readBuildConfig(pkg: string): BuildConfig {
    return JSON.parse(readFileSync(repoFile(`packages/${pkg}/tsconfig.build.json`), 'utf8'));
}

describe('packaging', () => {
    it('points the billsort bin at the compiled CLI entry point', () => {
        expect(readJson('package.json').bin).toEqual({ billsort: 'packages/cli/dist/index.js' });
        expect(readJson('packages/cli/package.json').bin).toEqual({ billsort: './dist/index.js' });
        expect(readFileSync(repoFile('packages/cli/src/index.ts'), 'utf8').startsWith('#!/usr/bin/env node\n')).toBe(true);
    });

    it.each(['shared', 'core'])('resolves @billsort/%s to compiled JavaScript at run time', (pkg) => {
        expect(readJson(`packages/${pkg}/package.json`).exports).toEqual({
            '.': { types: './src/index.ts', default: './dist/index.js' },
        });
    });

    it.each(['shared', 'core', 'cli'])('compiles only the %s sources into dist', (pkg) => {
        const config = readBuildConfig(pkg);
        expect(config.compilerOptions).toMatchObject({ rootDir: 'src', outDir: 'dist', composite: true });
        expect(config.include).toEqual(['src/**/*.ts']);
    });

    it('builds the CLI after the packages it imports', () => {
        expect(readBuildConfig('cli').references).toEqual([
            { path: '../shared/tsconfig.build.json' },
            { path: '../core/tsconfig.build.json' },
        ]);
        expect(readJson('package.json').scripts).toMatchObject({ build: 'tsc -b packages/cli/tsconfig.build.json' });
    });
});
