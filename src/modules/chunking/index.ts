/**
 * Chunking Module
 * Chunk planning, metadata sidecars and per-format serialization
 */

export * from './chunking.types';
export * from './chunking.planner';
export * from './chunking.metadata';
export * from './chunking.serializer';
