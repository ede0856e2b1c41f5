/**
 * Chunking Types
 */

import type { ChunkPolicy, OutputFormat } from '@/config/constants';
import type { Dimensions } from '@/utils/dimensions';

export type { ChunkPolicy, OutputFormat };

/**
 * One contiguous frame range of a clip. `endFrame` is exclusive.
 */
export interface ChunkRange {
  index: number; // Position in the plan, becomes the chunk_NNNNN ordinal
  startFrame: number;
  endFrame: number;
  frameCount: number; // endFrame - startFrame
  isPadded: boolean; // Short tail that the serializer extends to targetFrames
  isTrimmed: boolean; // Frames after this range were discarded
}

export interface ChunkPlan {
  totalFrames: number;
  targetFrames: number;
  policy: ChunkPolicy;
  ranges: ChunkRange[];
  discardedFrames: number;
}

/**
 * Sidecar record. Field names are a contract with downstream loaders.
 */
export interface ChunkMetadata {
  key: string; // "<clipKey>/chunk_NNNNN"
  fps: number;
  frame_count: number;
  size: [number, number]; // [height, width]
  is_padded?: boolean;
  is_trimmed?: boolean;
  original_fps?: number;
}

export interface ChunkArtifact {
  clipKey: string;
  chunkIndex: number;
  chunkName: string; // chunk_NNNNN
  path: string; // .npy file or chunk directory
  metadataPath: string;
  metadata: ChunkMetadata;
}

export interface SerializeContext {
  clipKey: string;
  outputDir: string; // <outputRoot>/<clipKey>
  fps: number;
  dimensions: Dimensions;
}
