/**
 * Weather Collector — Local Storage Backend
 *
 * Directory-backed StorageBackend for running without an object store.
 * Objects are plain files named by key.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { StorageError, describeError } from '../errors';
import type { StorageBackend } from './backend';

function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class LocalStorage implements StorageBackend {
    constructor(private readonly rootDir: string) { }

    private resolveKey(key: string, operation: 'get' | 'put'): string {
        if (!key || key.includes('/') || key.includes('\\') || key.startsWith('.')) {
            throw new StorageError(`Invalid storage key: ${key}`, { key, operation });
        }
        return path.join(this.rootDir, key);
    }

    async get(key: string): Promise<Uint8Array | null> {
        const filePath = this.resolveKey(key, 'get');
        try {
            return new Uint8Array(await readFile(filePath));
        } catch (error) {
            if (isNotFound(error)) return null;
            throw new StorageError(`Failed to read ${filePath}: ${describeError(error)}`, {
                key,
                operation: 'get',
                cause: error
            });
        }
    }

    /**
     * Write to a temporary file and rename over the target, so a failed write
     * leaves the previous object in place. Content type is implied by the key.
     */
    async put(key: string, data: Uint8Array): Promise<void> {
        const filePath = this.resolveKey(key, 'put');
        const tempPath = `${filePath}.${process.pid}.tmp`;
        try {
            await mkdir(this.rootDir, { recursive: true });
            await writeFile(tempPath, data);
            await rename(tempPath, filePath);
        } catch (error) {
            await rm(tempPath, { force: true });
            throw new StorageError(`Failed to write ${filePath}: ${describeError(error)}`, {
                key,
                operation: 'put',
                cause: error
            });
        }
    }
}
