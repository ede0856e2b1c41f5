/**
 * Sharding Types
 */

import type { OutputFormat } from '@/config/constants';

export type { OutputFormat };

export interface ShardEntry {
  name: string; // Path inside the tar archive
  sourcePath: string;
}

export interface ShardResult {
  shardCount: number;
  sampleCount: number;
  shards: string[]; // Paths of the written tar files
}
