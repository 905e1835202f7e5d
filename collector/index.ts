/**
 * Weather Collector — Main Entry Point
 *
 * Re-exports all public APIs.
 */

// Core types
export * from './types';
export * from './errors';

// Record pipeline
export * from './normalize';
export * from './clean';
export * from './csv';
export * from './dataset';

// Collaborators
export type { StorageBackend } from './storage/backend';
export * from './storage/s3-storage';
export * from './storage/local-storage';
export * from './ingest/fetcher';
export * from './ingest/pipeline';

export * from './config';
export * from './regions';
export * from './time';
