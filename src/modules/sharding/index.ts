/**
 * Sharding Module
 * WebDataset tar shards built from chunk artifacts
 */

export * from './sharding.types';
export * from './sharding.service';
