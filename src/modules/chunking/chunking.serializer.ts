/**
 * Chunk serializers
 * One strategy per output format, chosen once per run. Both consume a chunk
 * plan and a decoded frame stream and persist one artifact per range.
 */

import { join } from 'path';
import { mkdir, rename, rm, unlink, writeFile } from 'fs/promises';
import sharp from 'sharp';
import {
  CHUNK_METADATA_FILENAME,
  FRAME_INDEX_DIGITS,
  NPY_EXTENSION,
  RGB_CHANNELS,
  type OutputFormat,
} from '@/config/constants';
import { env } from '@/config/env';
import { frameByteSize, type Dimensions } from '@/utils/dimensions';
import { FrameStreamError, SerializationError, errorMessage } from '@/utils/errors';
import { zeroPad } from '@/utils/file-utils';
import { logger } from '@/utils/logger';
import { writeNpyFile } from '@/modules/npy';
import type { DecodeMode, FrameStream, ImageFrameStream, RawFrameStream } from '@/modules/decode';
import { buildChunkMetadata, writeChunkMetadata } from './chunking.metadata';
import { formatChunkName } from './chunking.planner';
import type { ChunkArtifact, ChunkMetadata, ChunkPlan, ChunkRange, SerializeContext } from './chunking.types';

export interface ChunkSerializer {
  readonly format: OutputFormat;
  readonly frameMode: DecodeMode;
  readonly imageExtension?: string;
  serialize(stream: FrameStream, plan: ChunkPlan, context: SerializeContext): Promise<ChunkArtifact[]>;
}

/**
 * Number of frames in a stream. Raw buffers must hold whole frames.
 */
export function countFrames(stream: FrameStream): number {
  if (stream.kind === 'images') {
    return stream.files.length;
  }

  const frameSize = frameByteSize(stream.dimensions, RGB_CHANNELS);
  if (stream.data.length % frameSize !== 0) {
    throw new FrameStreamError(
      `raw frame buffer of ${stream.data.length} bytes is not a multiple of the ${frameSize}-byte frame size`,
    );
  }
  return stream.data.length / frameSize;
}

async function guard<T>(description: string, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error) {
    throw new SerializationError(`${description}: ${errorMessage(error)}`, error);
  }
}

function chunkMetadataFor(
  context: SerializeContext,
  plan: ChunkPlan,
  range: ChunkRange,
  chunkName: string,
  sourceFps: number | undefined,
): ChunkMetadata {
  return buildChunkMetadata({
    clipKey: context.clipKey,
    chunkName,
    fps: context.fps,
    frameCount: plan.targetFrames,
    dimensions: context.dimensions,
    range,
    originalFps: sourceFps,
  });
}

/**
 * `chunk_NNNNN.npy` holding a (frames, height, width, 3) uint8 tensor, with
 * `chunk_NNNNN_metadata.json` beside it
 */
export class NpyChunkSerializer implements ChunkSerializer {
  readonly format = 'npy' as const;
  readonly frameMode = 'raw' as const;

  async serialize(stream: FrameStream, plan: ChunkPlan, context: SerializeContext): Promise<ChunkArtifact[]> {
    if (stream.kind !== 'raw') {
      throw new FrameStreamError(`npy output needs a raw frame stream, got ${stream.kind}`);
    }
    return this.writeChunks(stream, plan, context);
  }

  private async writeChunks(
    stream: RawFrameStream,
    plan: ChunkPlan,
    context: SerializeContext,
  ): Promise<ChunkArtifact[]> {
    const totalFrames = countFrames(stream);
    if (totalFrames !== plan.totalFrames) {
      throw new FrameStreamError(`plan covers ${plan.totalFrames} frames but stream has ${totalFrames}`);
    }

    const { height, width } = context.dimensions;
    const frameSize = frameByteSize(context.dimensions, RGB_CHANNELS);
    const artifacts: ChunkArtifact[] = [];

    await guard(`failed to create ${context.outputDir}`, () => mkdir(context.outputDir, { recursive: true }));

    for (const range of plan.ranges) {
      const chunkName = formatChunkName(range.index);
      const npyPath = join(context.outputDir, `${chunkName}${NPY_EXTENSION}`);
      const metadataPath = join(context.outputDir, `${chunkName}_metadata.json`);

      let payload = stream.data.subarray(range.startFrame * frameSize, range.endFrame * frameSize);
      if (range.isPadded) {
        // Buffer.alloc is zero-filled: missing frames are black
        const missing = (plan.targetFrames - range.frameCount) * frameSize;
        payload = Buffer.concat([payload, Buffer.alloc(missing)]);
      }

      const metadata = chunkMetadataFor(context, plan, range, chunkName, stream.sourceFps);

      await guard(`failed to write ${npyPath}`, () =>
        writeNpyFile(npyPath, payload, [plan.targetFrames, height, width, RGB_CHANNELS]),
      );
      await guard(`failed to write ${metadataPath}`, () => writeChunkMetadata(metadataPath, metadata));

      artifacts.push({
        clipKey: context.clipKey,
        chunkIndex: range.index,
        chunkName,
        path: npyPath,
        metadataPath,
        metadata,
      });
    }

    return artifacts;
  }
}

/**
 * `frame_NNN.<ext>`, widened so every name in a chunk of `targetFrames` has
 * the same length and name order matches frame order
 */
export function frameFileName(position: number, targetFrames: number, extension: string): string {
  const digits = Math.max(FRAME_INDEX_DIGITS, String(targetFrames).length);
  return `frame_${zeroPad(position, digits)}.${extension}`;
}

export type BlankFrameRenderer = (dimensions: Dimensions, extension: string) => Promise<Buffer>;

export const renderBlankFrame: BlankFrameRenderer = async ({ width, height }, extension) => {
  const image = sharp({
    create: { width, height, channels: RGB_CHANNELS, background: { r: 0, g: 0, b: 0 } },
  });

  if (extension === 'png') {
    return image.png().toBuffer();
  }
  return image.jpeg({ quality: env.JPEG_QUALITY }).toBuffer();
};

/**
 * `chunk_NNNNN/frame_NNN.<ext>` plus `chunk_NNNNN/metadata.json`.
 * Decoded frames are moved, never copied; frames outside every range are
 * deleted together with the decoder's working directory.
 */
export class ImageChunkSerializer implements ChunkSerializer {
  readonly format = 'jpg' as const;
  readonly frameMode = 'images' as const;

  constructor(
    readonly imageExtension: string = 'jpg',
    private renderBlank: BlankFrameRenderer = renderBlankFrame,
  ) {}

  async serialize(stream: FrameStream, plan: ChunkPlan, context: SerializeContext): Promise<ChunkArtifact[]> {
    if (stream.kind !== 'images') {
      throw new FrameStreamError(`image output needs an image frame stream, got ${stream.kind}`);
    }
    if (stream.files.length !== plan.totalFrames) {
      throw new FrameStreamError(`plan covers ${plan.totalFrames} frames but stream has ${stream.files.length}`);
    }

    const artifacts = await this.writeChunks(stream, plan, context);
    await this.discardLeftovers(stream, plan);
    return artifacts;
  }

  private async writeChunks(
    stream: ImageFrameStream,
    plan: ChunkPlan,
    context: SerializeContext,
  ): Promise<ChunkArtifact[]> {
    const artifacts: ChunkArtifact[] = [];
    let blankFrame: Buffer | null = null;

    for (const range of plan.ranges) {
      const chunkName = formatChunkName(range.index);
      const chunkDir = join(context.outputDir, chunkName);
      const metadataPath = join(chunkDir, CHUNK_METADATA_FILENAME);

      await guard(`failed to create ${chunkDir}`, () => mkdir(chunkDir, { recursive: true }));

      for (let offset = 0; offset < range.frameCount; offset++) {
        const source = stream.files[range.startFrame + offset];
        const target = join(chunkDir, frameFileName(offset + 1, plan.targetFrames, stream.extension));
        await guard(`failed to move ${source}`, () => rename(source, target));
      }

      if (range.isPadded) {
        if (!blankFrame) {
          blankFrame = await guard('failed to render blank frame', () =>
            this.renderBlank(context.dimensions, stream.extension),
          );
        }
        const frame = blankFrame;

        for (let position = range.frameCount + 1; position <= plan.targetFrames; position++) {
          const target = join(chunkDir, frameFileName(position, plan.targetFrames, stream.extension));
          await guard(`failed to write ${target}`, () => writeFile(target, frame));
        }
      }

      const metadata = chunkMetadataFor(context, plan, range, chunkName, stream.sourceFps);
      await guard(`failed to write ${metadataPath}`, () => writeChunkMetadata(metadataPath, metadata));

      artifacts.push({
        clipKey: context.clipKey,
        chunkIndex: range.index,
        chunkName,
        path: chunkDir,
        metadataPath,
        metadata,
      });
    }

    return artifacts;
  }

  private async discardLeftovers(stream: ImageFrameStream, plan: ChunkPlan): Promise<void> {
    const last = plan.ranges[plan.ranges.length - 1];
    const consumed = last ? last.endFrame : 0;
    const leftovers = stream.files.slice(consumed);

    for (const file of leftovers) {
      await guard(`failed to delete ${file}`, () => unlink(file));
    }
    await guard(`failed to remove ${stream.directory}`, () =>
      rm(stream.directory, { recursive: true, force: true }),
    );

    if (leftovers.length > 0) {
      logger.debug({ discarded: leftovers.length, directory: stream.directory }, 'Discarded trailing frames');
    }
  }
}

export function createChunkSerializer(format: OutputFormat): ChunkSerializer {
  switch (format) {
    case 'npy':
      return new NpyChunkSerializer();
    case 'jpg':
      return new ImageChunkSerializer('jpg');
  }
}
