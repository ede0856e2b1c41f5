/**
 * Pipeline Module
 * Per-clip processing and the bounded worker pool that runs it over a batch
 */

export * from './pipeline.types';
export * from './pipeline.schemas';
export * from './pipeline.service';
export * from './pipeline.orchestrator';
