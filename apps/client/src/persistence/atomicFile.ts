import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { DecodeError } from '@/errors';

function isNotFound(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads and parses a JSON file.
 * Returns null when the file does not exist; throws DecodeError when it is not JSON.
 */
export async function readJsonFile(path: string): Promise<unknown | null> {
    let raw: string;
    try {
        raw = await readFile(path, 'utf8');
    } catch (error) {
        if (isNotFound(error)) {
            return null;
        }
        throw error;
    }

    try {
        const parsed: unknown = JSON.parse(raw);
        return parsed;
    } catch (error) {
        throw new DecodeError(`Invalid JSON in ${path}`, { cause: error });
    }
}

/**
 * Writes `value` as JSON to a sibling temp file, then renames it over `path`.
 * A crash leaves either the old file or the new one.
 */
export async function writeJsonFileAtomic(path: string, value: unknown, opts?: { mode?: number }): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    const tmpPath = `${path}.${process.pid}.${randomUUID()}.tmp`;
    try {
        await writeFile(tmpPath, JSON.stringify(value, null, 2), { encoding: 'utf8', mode: opts?.mode });
        await rename(tmpPath, path);
    } catch (error) {
        await rm(tmpPath, { force: true });
        throw error;
    }
}

export async function removeFile(path: string): Promise<void> {
    await rm(path, { force: true });
}

export async function removeDirectory(path: string): Promise<void> {
    await rm(path, { recursive: true, force: true });
}
