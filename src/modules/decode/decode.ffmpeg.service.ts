/**
 * FFmpeg Decode Engine
 * Resamples and resizes a clip with ffmpeg, producing either one raw RGB24
 * buffer or a directory of numbered frame images
 */

import { join } from 'path';
import { mkdir, readFile } from 'fs/promises';
import ffmpeg from 'fluent-ffmpeg';
import { env } from '@/config/env';
import { DECODED_FRAME_PREFIX } from '@/config/constants';
import { logger } from '@/utils/logger';
import { DecodeError, errorMessage } from '@/utils/errors';
import { listSortedFiles } from '@/utils/file-utils';
import { composeFilters, fpsFilter, scaleFilter } from './decode.filters';
import { qualityOptions, streamFrameRate } from './decode.options';
import type { DecodeEngine, DecodeRequest, FrameStream } from './decode.types';

export interface FfmpegDecodeEngineOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
  jpegQuality?: number; // 1-100
}

export class FfmpegDecodeEngine implements DecodeEngine {
  private ffmpegPath: string;
  private ffprobePath: string;
  private jpegQuality: number;

  constructor(options: FfmpegDecodeEngineOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? env.FFMPEG_PATH;
    this.ffprobePath = options.ffprobePath ?? env.FFPROBE_PATH;
    this.jpegQuality = options.jpegQuality ?? env.JPEG_QUALITY;
  }

  async decode(request: DecodeRequest): Promise<FrameStream> {
    const startTime = Date.now();
    const filterChain = composeFilters(fpsFilter(request.fps), scaleFilter(request.dimensions));

    await mkdir(request.workDir, { recursive: true });
    const sourceFps = await this.probeFrameRate(request.inputPath);

    try {
      if (request.mode === 'raw') {
        const rawPath = join(request.workDir, 'frames.rgb');
        await this.run(request.inputPath, rawPath, [
          '-vf',
          filterChain,
          '-f',
          'rawvideo',
          '-pix_fmt',
          'rgb24',
        ]);
        const data = await readFile(rawPath);

        logger.debug(
          { clipKey: request.clipKey, bytes: data.length, timeMs: Date.now() - startTime },
          'Raw frame decode completed',
        );

        return {
          kind: 'raw',
          data,
          dimensions: request.dimensions,
          ...(sourceFps !== null ? { sourceFps } : {}),
        };
      }

      const extension = request.imageExtension ?? 'jpg';
      const pattern = join(request.workDir, `${DECODED_FRAME_PREFIX}%06d.${extension}`);
      await this.run(request.inputPath, pattern, [
        '-vf',
        filterChain,
        ...qualityOptions(extension, this.jpegQuality),
      ]);

      const names = await listSortedFiles(
        request.workDir,
        (name) => name.startsWith(DECODED_FRAME_PREFIX) && name.endsWith(`.${extension}`),
      );

      logger.debug(
        { clipKey: request.clipKey, frames: names.length, timeMs: Date.now() - startTime },
        'Image frame decode completed',
      );

      return {
        kind: 'images',
        directory: request.workDir,
        files: names.map((name) => join(request.workDir, name)),
        extension,
        dimensions: request.dimensions,
        ...(sourceFps !== null ? { sourceFps } : {}),
      };
    } catch (error) {
      throw new DecodeError(`error extracting frames: ${errorMessage(error)}`, error);
    }
  }

  /**
   * Source frame rate from ffprobe, or null when it cannot be determined
   */
  probeFrameRate(inputPath: string): Promise<number | null> {
    return new Promise((resolve) => {
      ffmpeg(inputPath)
        .setFfprobePath(this.ffprobePath)
        .ffprobe((err, metadata) => {
          if (err) {
            logger.warn({ inputPath, error: errorMessage(err) }, 'ffprobe failed, original fps unknown');
            resolve(null);
            return;
          }

          const videoStream = metadata.streams.find((s) => s.codec_type === 'video');
          resolve(streamFrameRate(videoStream));
        });
    });
  }

  private run(inputPath: string, output: string, outputOptions: string[]): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      ffmpeg(inputPath)
        .setFfmpegPath(this.ffmpegPath)
        .outputOptions([
          ...outputOptions,
          '-an', // No audio
          '-sn', // No subtitles
          '-dn', // No data streams
        ])
        .output(output)
        .on('start', (commandLine: string) => {
          logger.trace({ commandLine }, 'Starting FFmpeg');
        })
        .on('end', () => resolve())
        .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
          logger.debug({ inputPath, stderr }, 'FFmpeg failed');
          reject(err);
        })
        .run();
    });
  }
}
