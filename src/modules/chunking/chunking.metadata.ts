import { writeFile } from 'fs/promises';
import type { Dimensions } from '@/utils/dimensions';
import type { ChunkMetadata, ChunkRange } from './chunking.types';

export interface ChunkMetadataInput {
  clipKey: string;
  chunkName: string;
  fps: number;
  frameCount: number;
  dimensions: Dimensions;
  range: Pick<ChunkRange, 'isPadded' | 'isTrimmed'>;
  originalFps?: number;
}

/**
 * Optional fields are left out when false or unknown, matching what existing
 * dataset loaders were written against.
 */
export function buildChunkMetadata(input: ChunkMetadataInput): ChunkMetadata {
  const metadata: ChunkMetadata = {
    key: `${input.clipKey}/${input.chunkName}`,
    fps: input.fps,
    frame_count: input.frameCount,
    size: [input.dimensions.height, input.dimensions.width],
  };

  if (input.range.isPadded) metadata.is_padded = true;
  if (input.range.isTrimmed) metadata.is_trimmed = true;
  if (input.originalFps !== undefined && input.originalFps > 0) {
    metadata.original_fps = input.originalFps;
  }

  return metadata;
}

export function serializeChunkMetadata(metadata: ChunkMetadata): string {
  return `${JSON.stringify(metadata, null, 2)}\n`;
}

export async function writeChunkMetadata(filePath: string, metadata: ChunkMetadata): Promise<void> {
  await writeFile(filePath, serializeChunkMetadata(metadata), 'utf8');
}
