/**
 * Decode Engine Types
 * Contract between the pipeline and the external video decoder
 */

import type { Dimensions } from '@/utils/dimensions';

export type DecodeMode = 'raw' | 'images';

export interface DecodeRequest {
  clipKey: string;
  inputPath: string; // Materialized clip on disk
  fps: number; // Target frame rate
  dimensions: Dimensions; // Target frame size
  mode: DecodeMode;
  workDir: string; // Where the engine may write its output
  imageExtension?: string; // Images mode only, defaults to 'jpg'
}

/**
 * Contiguous RGB24 frames, `data.length` a multiple of width*height*3
 */
export interface RawFrameStream {
  kind: 'raw';
  data: Buffer;
  dimensions: Dimensions;
  sourceFps?: number;
}

/**
 * Per-frame image files, sorted so that name order is temporal order
 */
export interface ImageFrameStream {
  kind: 'images';
  directory: string;
  files: string[]; // Absolute paths
  extension: string;
  dimensions: Dimensions;
  sourceFps?: number;
}

export type FrameStream = RawFrameStream | ImageFrameStream;

export interface DecodeEngine {
  decode(request: DecodeRequest): Promise<FrameStream>;
}
