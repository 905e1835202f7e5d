/**
 * Weather Collector — S3 Storage Backend
 *
 * Implementation of StorageBackend for S3 and S3-compatible object stores.
 */

import {
    GetObjectCommand,
    PutObjectCommand,
    S3Client,
    S3ServiceException
} from '@aws-sdk/client-s3';
import { StorageError, describeError } from '../errors';
import type { StorageBackend } from './backend';

/**
 * The slice of S3Client this backend calls. S3Client satisfies it;
 * tests pass an in-memory client.
 */
export interface S3ObjectClient {
    send(command: GetObjectCommand): Promise<{ Body?: { transformToByteArray(): Promise<Uint8Array> } }>;
    send(command: PutObjectCommand): Promise<unknown>;
}

export interface S3StorageOptions {
    bucket: string;
    region: string;
    endpoint?: string;
    forcePathStyle?: boolean;
}

function isMissingObjectError(error: unknown): boolean {
    if (!(error instanceof S3ServiceException)) {
        return false;
    }
    return error.name === 'NoSuchKey' || error.name === 'NotFound' || error.$metadata?.httpStatusCode === 404;
}

/**
 * S3 storage backend for the daily datasets.
 */
export class S3Storage implements StorageBackend {
    constructor(
        private readonly client: S3ObjectClient,
        private readonly bucket: string
    ) { }

    async get(key: string): Promise<Uint8Array | null> {
        try {
            const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
            if (!response.Body) return new Uint8Array();
            return await response.Body.transformToByteArray();
        } catch (error) {
            if (isMissingObjectError(error)) return null;
            throw new StorageError(`Failed to read s3://${this.bucket}/${key}: ${describeError(error)}`, {
                key,
                operation: 'get',
                cause: error
            });
        }
    }

    async put(key: string, data: Uint8Array, contentType?: string): Promise<void> {
        try {
            await this.client.send(
                new PutObjectCommand({
                    Bucket: this.bucket,
                    Key: key,
                    Body: data,
                    ContentType: contentType
                })
            );
        } catch (error) {
            throw new StorageError(`Failed to write s3://${this.bucket}/${key}: ${describeError(error)}`, {
                key,
                operation: 'put',
                cause: error
            });
        }
    }
}

export function createS3Storage(options: S3StorageOptions): S3Storage {
    const client = new S3Client({
        region: options.region,
        endpoint: options.endpoint,
        forcePathStyle: options.forcePathStyle ?? false
    });
    return new S3Storage(client, options.bucket);
}
