import { existsSync, readFileSync } from 'node:fs';
import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { LearningStore, PersistedDocuments, RawDocuments } from '@billsort/core';
import type { StoragePaths } from '../types.js';

/**
 * Learning store backed by two JSON files: the rules document and the
 * history list.
 *
 * Loading never throws: unreadable or malformed files are reported as
 * warnings and treated as absent. Saving writes both files to temporary
 * siblings before renaming either into place, so a failed write leaves the
 * previous pair intact.
 */
export class JsonFileStore implements LearningStore {
    constructor(private readonly paths: StoragePaths) {}

    load(): RawDocuments {
        const warnings: string[] = [];
        const rules = readJsonDocument(this.paths.rulesPath, warnings);
        const history = readJsonDocument(this.paths.historyPath, warnings);
        return { rules, history, warnings };
    }

    async save(documents: PersistedDocuments): Promise<void> {
        // Rules are written compact; the history stays human-readable.
        await writeFilesAtomic([
            { path: this.paths.rulesPath, content: JSON.stringify(documents.rules) },
            { path: this.paths.historyPath, content: JSON.stringify(documents.history, null, 2) },
        ]);
    }
}

function readJsonDocument(path: string, warnings: string[]): unknown {
    if (!existsSync(path)) return undefined;

    let content: string;
    try {
        content = readFileSync(path, 'utf-8');
    } catch (err) {
        warnings.push(`Could not read ${path}, starting fresh: ${(err as Error).message}`);
        return undefined;
    }

    try {
        return JSON.parse(content);
    } catch (err) {
        warnings.push(`Malformed JSON in ${path}, starting fresh: ${(err as Error).message}`);
        return undefined;
    }
}

interface FileWrite {
    path: string;
    content: string;
}

interface StagedFile {
    path: string;
    tmpPath: string;
}

async function stageFile({ path, content }: FileWrite): Promise<StagedFile> {
    await mkdir(dirname(path), { recursive: true });
    const tmpPath = `${path}.${process.pid}.tmp`;
    try {
        await writeFile(tmpPath, content, 'utf8');
    } catch (err) {
        await rm(tmpPath, { force: true });
        throw err;
    }
    return { path, tmpPath };
}

/**
 * Write every file to a temp sibling, then rename them all into place.
 * Nothing is renamed until every temp file is written. Rename within one
 * directory replaces the target in a single step on POSIX and NTFS.
 */
export async function writeFilesAtomic(files: FileWrite[]): Promise<void> {
    const staged: StagedFile[] = [];
    try {
        for (const file of files) {
            staged.push(await stageFile(file));
        }
        for (const file of staged) {
            await rename(file.tmpPath, file.path);
        }
    } catch (err) {
        await Promise.all(staged.map(file => rm(file.tmpPath, { force: true })));
        throw err;
    }
}

export async function writeFileAtomic(path: string, content: string): Promise<void> {
    await writeFilesAtomic([{ path, content }]);
}
