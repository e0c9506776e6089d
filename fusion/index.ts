/**
 * Forecast Fusion — Main Entry Point
 *
 * Re-exports all public APIs.
 */

// Core types and errors
export * from './types';
export * from './errors';
export * from './config';

// Fusion core
export * from './normalize';
export * from './aggregate';
export * from './uncertainty';
export * from './corroborate';

// Records
export * from './canonical';
export * from './hash';
export * from './record';

// Chart
export * from './chart/model';
export * from './chart/render';

// Collaborators
export * from './ingest/providers';
export * from './ingest/references';
export * from './ingest/storage';
export * from './ingest/pipeline';
export { loadRunConfig, parseCities, DEFAULT_CITIES, type RunConfig, type PushoverConfig } from './ingest/config';
export * from './notify/summary';
export * from './notify/pushover';
