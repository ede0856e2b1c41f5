import { MAX_CHUNKS_PER_CLIP, CHUNK_INDEX_DIGITS } from '@/config/constants';
import { ChunkIndexOverflowError, ValidationError } from '@/utils/errors';
import { zeroPad } from '@/utils/file-utils';
import type { ChunkPlan, ChunkPolicy, ChunkRange } from './chunking.types';

/**
 * Splits `totalFrames` into consecutive ranges of `targetFrames`.
 *
 * truncate: only complete ranges, the remainder is discarded.
 * pad: complete ranges plus one short tail range flagged `isPadded`.
 */
export function planChunks(
  totalFrames: number,
  targetFrames: number,
  policy: ChunkPolicy = 'truncate',
): ChunkPlan {
  if (!Number.isSafeInteger(targetFrames) || targetFrames <= 0) {
    throw new ValidationError(`target frames must be a positive integer, got ${targetFrames}`);
  }
  if (!Number.isSafeInteger(totalFrames) || totalFrames < 0) {
    throw new ValidationError(`total frames must be a non-negative integer, got ${totalFrames}`);
  }

  const completeCount = Math.floor(totalFrames / targetFrames);
  const remainder = totalFrames % targetFrames;
  const padTail = policy === 'pad' && remainder > 0;
  const chunkCount = completeCount + (padTail ? 1 : 0);

  if (chunkCount > MAX_CHUNKS_PER_CLIP) {
    throw new ChunkIndexOverflowError(chunkCount, MAX_CHUNKS_PER_CLIP);
  }

  const ranges: ChunkRange[] = [];
  for (let index = 0; index < completeCount; index++) {
    const startFrame = index * targetFrames;
    ranges.push({
      index,
      startFrame,
      endFrame: startFrame + targetFrames,
      frameCount: targetFrames,
      isPadded: false,
      isTrimmed: false,
    });
  }

  if (padTail) {
    const startFrame = completeCount * targetFrames;
    ranges.push({
      index: completeCount,
      startFrame,
      endFrame: totalFrames,
      frameCount: remainder,
      isPadded: true,
      isTrimmed: false,
    });
  }

  const discardedFrames = padTail ? 0 : remainder;
  const last = ranges[ranges.length - 1];
  if (discardedFrames > 0 && last) {
    last.isTrimmed = true;
  }

  return { totalFrames, targetFrames, policy, ranges, discardedFrames };
}

export function formatChunkName(index: number): string {
  if (!Number.isSafeInteger(index) || index < 0 || index >= MAX_CHUNKS_PER_CLIP) {
    throw new ChunkIndexOverflowError(index + 1, MAX_CHUNKS_PER_CLIP);
  }
  return `chunk_${zeroPad(index, CHUNK_INDEX_DIGITS)}`;
}
