/**
 * Weather Collector — Storage Interface (abstract over S3/local)
 */

export interface StorageBackend {
    /** Get object, or null when no object exists under the key */
    get(key: string): Promise<Uint8Array | null>;

    /** Replace the object under the key in a single write */
    put(key: string, data: Uint8Array, contentType?: string): Promise<void>;
}
