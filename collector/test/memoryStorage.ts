import type { StorageBackend } from '../storage/backend';

type Stored = {
    body: Uint8Array;
    contentType?: string;
};

/**
 * Map-backed StorageBackend for tests.
 */
export class MemoryStorage implements StorageBackend {
    readonly objects = new Map<string, Stored>();
    putCalls = 0;

    async get(key: string): Promise<Uint8Array | null> {
        return this.objects.get(key)?.body ?? null;
    }

    async put(key: string, data: Uint8Array, contentType?: string): Promise<void> {
        this.putCalls++;
        this.objects.set(key, { body: new Uint8Array(data), contentType });
    }

    /** Seed or read an object as text */
    setText(key: string, text: string): void {
        this.objects.set(key, { body: new TextEncoder().encode(text), contentType: 'text/csv' });
    }

    getText(key: string): string | null {
        const stored = this.objects.get(key);
        return stored ? new TextDecoder().decode(stored.body) : null;
    }
}
