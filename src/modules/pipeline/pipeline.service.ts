/**
 * Clip Pipeline
 * Drives one clip from encoded bytes to chunk artifacts:
 * materialize -> decode -> plan -> serialize -> clean up
 */

import { join } from 'path';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { env } from '@/config/env';
import { DecodeError, errorMessage } from '@/utils/errors';
import { formatBytes } from '@/utils/file-utils';
import { logger } from '@/utils/logger';
import type { Clip } from '@/modules/archive';
import type { DecodeEngine, FrameStream } from '@/modules/decode';
import { countFrames, planChunks, type ChunkSerializer } from '@/modules/chunking';
import type { ClipProcessingOptions, ClipProcessor, ClipResult } from './pipeline.types';

// Decoder output for image mode lives beside the chunks so frames can be renamed into place
export const FRAME_WORK_DIRNAME = '.frames';

export class ClipPipeline implements ClipProcessor {
  constructor(
    private engine: DecodeEngine,
    private serializer: ChunkSerializer,
    private tempDir: string = env.TEMP_DIR,
  ) {}

  get format() {
    return this.serializer.format;
  }

  async process(clip: Clip, options: ClipProcessingOptions): Promise<ClipResult> {
    const startTime = Date.now();
    const clipOutputDir = join(options.outputDir, clip.key);
    const workRoot = await mkdtemp(join(this.tempDir, 'vidchunk-'));
    const framesDir =
      this.serializer.frameMode === 'images'
        ? join(clipOutputDir, FRAME_WORK_DIRNAME)
        : join(workRoot, 'frames');

    try {
      const inputPath = join(workRoot, `input${clip.extension ?? '.mp4'}`);
      await writeFile(inputPath, clip.data);
      await mkdir(clipOutputDir, { recursive: true });

      const stream = await this.decode(clip, inputPath, framesDir, options);
      const plan = planChunks(countFrames(stream), options.targetFrames, options.policy);

      if (plan.ranges.length === 0) {
        logger.warn(
          { key: clip.key, totalFrames: plan.totalFrames, targetFrames: plan.targetFrames },
          'Clip too short, 0 chunks produced',
        );
      }

      const chunks = await this.serializer.serialize(stream, plan, {
        clipKey: clip.key,
        outputDir: clipOutputDir,
        fps: options.fps,
        dimensions: options.dimensions,
      });

      const durationMs = Date.now() - startTime;
      logger.debug(
        {
          key: clip.key,
          inputSize: formatBytes(clip.data.length),
          totalFrames: plan.totalFrames,
          chunks: chunks.length,
          discardedFrames: plan.discardedFrames,
          timeMs: durationMs,
        },
        'Clip processed',
      );

      return { key: clip.key, chunks, plan, durationMs };
    } finally {
      await this.cleanup(workRoot);
      if (this.serializer.frameMode === 'images') {
        await this.cleanup(framesDir);
      }
    }
  }

  private async decode(
    clip: Clip,
    inputPath: string,
    workDir: string,
    options: ClipProcessingOptions,
  ): Promise<FrameStream> {
    try {
      return await this.engine.decode({
        clipKey: clip.key,
        inputPath,
        fps: options.fps,
        dimensions: options.dimensions,
        mode: this.serializer.frameMode,
        workDir,
        imageExtension: this.serializer.imageExtension,
      });
    } catch (error) {
      if (error instanceof DecodeError) throw error;
      throw new DecodeError(`error extracting frames: ${errorMessage(error)}`, error);
    }
  }

  private async cleanup(directory: string): Promise<void> {
    try {
      await rm(directory, { recursive: true, force: true });
    } catch (error) {
      logger.warn({ directory, error: errorMessage(error) }, 'Failed to remove temporary directory');
    }
  }
}
