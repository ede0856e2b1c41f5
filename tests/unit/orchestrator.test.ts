import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'fs';
import { join } from 'path';
import type { Clip } from '@/modules/archive';
import {
  ParallelOrchestrator,
  processAll,
  type ClipProcessingOptions,
  type ClipProcessor,
  type ClipResult,
} from '@/modules/pipeline';
import { planChunks } from '@/modules/chunking';
import { BatchProcessingError, ValidationError } from '@/utils/errors';
import { FakeDecodeEngine, createTempDir, listDir, removeDir } from '../helpers/test-utils';

function clips(...keys: string[]): Clip[] {
  return keys.map((key) => ({ key, data: Buffer.from(key) }));
}

const options: ClipProcessingOptions = {
  outputDir: '/unused',
  fps: 8,
  dimensions: { width: 4, height: 2 },
  targetFrames: 8,
  policy: 'truncate',
};

/**
 * Tracks how many clips are in flight at once
 */
class CountingProcessor implements ClipProcessor {
  readonly format = 'npy' as const;
  active = 0;
  maxActive = 0;
  processed: string[] = [];

  constructor(private failing: string[] = []) {}

  async process(clip: Clip): Promise<ClipResult> {
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    await new Promise((resolve) => setTimeout(resolve, 5));
    this.active--;

    if (this.failing.includes(clip.key)) {
      throw new Error(`cannot decode ${clip.key}`);
    }
    this.processed.push(clip.key);
    return { key: clip.key, chunks: [], plan: planChunks(0, 8), durationMs: 5 };
  }
}

describe('ParallelOrchestrator', () => {
  it('should never run more clips at once than it has workers', async () => {
    const processor = new CountingProcessor();
    const orchestrator = new ParallelOrchestrator(processor, { workers: 3 });

    const result = await orchestrator.run(clips('a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'), options);

    expect(processor.maxActive).toBe(3);
    expect(result.total).toBe(8);
    expect(result.succeeded).toBe(8);
    expect(result.failures).toEqual([]);
    expect([...processor.processed].sort()).toEqual(['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h']);
  });

  it('should treat fewer than one worker as one', async () => {
    const processor = new CountingProcessor();
    const orchestrator = new ParallelOrchestrator(processor, { workers: 0 });

    await orchestrator.run(clips('a', 'b', 'c'), options);

    expect(orchestrator.workerCount).toBe(1);
    expect(processor.maxActive).toBe(1);
    expect(processor.processed).toEqual(['a', 'b', 'c']);
  });

  it('should keep going after a clip fails', async () => {
    const processor = new CountingProcessor(['b', 'd']);
    const orchestrator = new ParallelOrchestrator(processor, { workers: 2 });

    const result = await orchestrator.run(clips('a', 'b', 'c', 'd', 'e'), options);

    expect(result.succeeded).toBe(3);
    expect(result.failures.map((f) => f.key).sort()).toEqual(['b', 'd']);
    expect(result.failures.find((f) => f.key === 'b')?.error.message).toBe('cannot decode b');
    expect([...processor.processed].sort()).toEqual(['a', 'c', 'e']);
  });

  it('should report progress once per clip', async () => {
    const orchestrator = new ParallelOrchestrator(new CountingProcessor(['b']), { workers: 2 });
    const events: Array<{ key: string; completed: number; failed: boolean }> = [];

    await orchestrator.run(clips('a', 'b', 'c'), options, {
      onClipDone: ({ key, completed, error }) => events.push({ key, completed, failed: error !== undefined }),
    });

    expect(events.map((e) => e.completed)).toEqual([1, 2, 3]);
    expect(events.find((e) => e.key === 'b')?.failed).toBe(true);
    expect(events.filter((e) => e.failed)).toHaveLength(1);
  });

  it('should finish the whole batch when a progress hook throws', async () => {
    const processor = new CountingProcessor();
    const orchestrator = new ParallelOrchestrator(processor, { workers: 2 });
    const seen: string[] = [];

    const result = await orchestrator.run(clips('a', 'b', 'c', 'd', 'e', 'f'), options, {
      onClipDone: ({ key }) => {
        seen.push(key);
        if (key === 'a') throw new Error('hook failed');
      },
    });

    expect(result.total).toBe(6);
    expect(result.succeeded).toBe(6);
    expect(result.failures).toEqual([]);
    expect([...processor.processed].sort()).toEqual(['a', 'b', 'c', 'd', 'e', 'f']);
    expect([...seen].sort()).toEqual(['a', 'b', 'c', 'd', 'e', 'f']);
  });

  it('should handle an empty batch', async () => {
    const result = await new ParallelOrchestrator(new CountingProcessor(), { workers: 4 }).run([], options);
    expect(result.total).toBe(0);
    expect(result.chunksWritten).toBe(0);
  });
});

describe('processAll', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('should write chunks for every clip of the batch', async () => {
    const engine = new FakeDecodeEngine({ frames: { a: 24, b: 16, c: 5 } });

    const result = await processAll(
      clips('a', 'b', 'c'),
      { outputDir: root, fps: 8, size: '4x2', format: 'npy', targetFrames: 8, workers: 2 },
      { engine },
    );

    expect(result.chunksWritten).toBe(5);
    expect(engine.maxActive).toBeLessThanOrEqual(2);
    expect(await listDir(join(root, 'a'))).toHaveLength(6);
    expect(await listDir(join(root, 'b'))).toHaveLength(4);
    expect(await listDir(join(root, 'c'))).toEqual([]);
  });

  it('should list the failed clip while its siblings still produce artifacts', async () => {
    const engine = new FakeDecodeEngine({ frames: 8, failing: ['bad'] });

    const run = processAll(
      clips('good_1', 'bad', 'good_2'),
      { outputDir: root, fps: 8, size: '4x2', format: 'npy', targetFrames: 8, workers: 3 },
      { engine },
    );

    await expect(run).rejects.toBeInstanceOf(BatchProcessingError);
    const error = await run.catch((e: unknown) => e);
    expect(error).toBeInstanceOf(BatchProcessingError);
    if (error instanceof BatchProcessingError) {
      expect(error.failedKeys).toEqual(['bad']);
      expect(error.message).toBe(
        'encountered 1 errors: bad: error extracting frames: ffmpeg exited with code 1',
      );
    }
    expect(existsSync(join(root, 'good_1', 'chunk_00000.npy'))).toBe(true);
    expect(existsSync(join(root, 'good_2', 'chunk_00000.npy'))).toBe(true);
  });

  it('should reject a malformed size before touching any clip', async () => {
    const engine = new FakeDecodeEngine({ frames: 8 });

    await expect(
      processAll(clips('a'), { outputDir: root, size: '256', format: 'npy' }, { engine }),
    ).rejects.toThrow('invalid size format: 256');
    expect(engine.requests).toEqual([]);
  });

  it('should reject non-positive chunk lengths', async () => {
    const engine = new FakeDecodeEngine({ frames: 8 });

    await expect(
      processAll(clips('a'), { outputDir: root, format: 'jpg', targetFrames: 0 }, { engine }),
    ).rejects.toBeInstanceOf(ValidationError);
    expect(engine.requests).toEqual([]);
  });

  it('should reject duplicate clip keys', async () => {
    const engine = new FakeDecodeEngine({ frames: 8 });

    await expect(
      processAll(clips('a', 'a'), { outputDir: root, format: 'npy', size: '4x2' }, { engine }),
    ).rejects.toThrow('duplicate clip key: a');
  });

  it('should reject clip keys that are not plain names', async () => {
    const engine = new FakeDecodeEngine({ frames: 8 });

    await expect(
      processAll(clips('../escape'), { outputDir: root, format: 'npy', size: '4x2' }, { engine }),
    ).rejects.toBeInstanceOf(ValidationError);
  });
});
