/**
 * Pipeline Types
 */

import type { ChunkPolicy, OutputFormat } from '@/config/constants';
import type { Dimensions } from '@/utils/dimensions';
import type { ClipFailure } from '@/utils/errors';
import type { Clip } from '@/modules/archive';
import type { ChunkArtifact, ChunkPlan } from '@/modules/chunking';

export type { ClipFailure };

/**
 * Per-clip settings, identical for every clip of a batch
 */
export interface ClipProcessingOptions {
  outputDir: string; // Root; each clip writes to <outputDir>/<clipKey>
  fps: number;
  dimensions: Dimensions;
  targetFrames: number;
  policy: ChunkPolicy;
}

export interface ClipResult {
  key: string;
  chunks: ChunkArtifact[];
  plan: ChunkPlan;
  durationMs: number;
}

export interface ClipProcessor {
  readonly format: OutputFormat;
  process(clip: Clip, options: ClipProcessingOptions): Promise<ClipResult>;
}

export interface BatchProgressEvent {
  key: string;
  completed: number;
  total: number;
  error?: Error;
}

export interface BatchHooks {
  onClipDone?: (event: BatchProgressEvent) => void;
}

export interface BatchResult {
  total: number;
  succeeded: number;
  failures: ClipFailure[];
  results: ClipResult[];
  chunksWritten: number;
  durationMs: number;
}
