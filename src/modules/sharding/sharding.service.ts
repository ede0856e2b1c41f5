/**
 * Shard Packer
 * Regroups chunk artifacts into WebDataset-style tar shards of a fixed
 * number of samples. Runs after clip processing, on a tree nobody is writing to.
 */

import { createWriteStream } from 'fs';
import { mkdir, readdir, readFile, rm } from 'fs/promises';
import { basename, join, posix, relative, sep } from 'path';
import { pack as tarPack, type Pack } from 'tar-stream';
import {
  CHUNK_METADATA_FILENAME,
  NPY_EXTENSION,
  SHARD_INDEX_DIGITS,
  type OutputFormat,
} from '@/config/constants';
import { ShardError, ValidationError, errorMessage } from '@/utils/errors';
import { fileExists, zeroPad } from '@/utils/file-utils';
import { logger } from '@/utils/logger';
import { validateSchema } from '@/utils/validation';
import { packShardsSchema } from '@/modules/pipeline/pipeline.schemas';
import type { ShardEntry, ShardResult } from './sharding.types';

const byName = (a: { name: string }, b: { name: string }) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);

export function formatShardName(index: number): string {
  return `shard_${zeroPad(index, SHARD_INDEX_DIGITS)}.tar`;
}

/**
 * Contiguous groups of at most `shardSize`, in input order
 */
export function partitionSamples<T>(samples: readonly T[], shardSize: number): T[][] {
  if (!Number.isSafeInteger(shardSize) || shardSize <= 0) {
    throw new ValidationError(`shard size must be a positive integer, got ${shardSize}`);
  }

  const groups: T[][] = [];
  for (let start = 0; start < samples.length; start += shardSize) {
    groups.push(samples.slice(start, start + shardSize));
  }
  return groups;
}

/**
 * Depth-first walk, entries visited in name order.
 * npy: every `.npy` file is a sample. jpg: every directory holding a
 * `metadata.json` is a sample.
 */
export async function discoverSamples(inputDir: string, format: OutputFormat): Promise<string[]> {
  const samples: string[] = [];

  const walk = async (directory: string): Promise<void> => {
    const entries = (await readdir(directory, { withFileTypes: true })).sort(byName);

    for (const entry of entries) {
      const fullPath = join(directory, entry.name);

      if (entry.isDirectory()) {
        if (format === 'jpg' && fileExists(join(fullPath, CHUNK_METADATA_FILENAME))) {
          samples.push(fullPath);
        }
        await walk(fullPath);
      } else if (format === 'npy' && entry.isFile() && entry.name.endsWith(NPY_EXTENSION)) {
        samples.push(fullPath);
      }
    }
  };

  await walk(inputDir);
  return samples;
}

async function listFilesRecursive(directory: string): Promise<string[]> {
  const files: string[] = [];
  const entries = (await readdir(directory, { withFileTypes: true })).sort(byName);

  for (const entry of entries) {
    const fullPath = join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFilesRecursive(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

/**
 * Archive entries for one sample. An npy file keeps only its base name; an
 * image chunk directory keeps its own name as the path prefix.
 */
export async function sampleEntries(samplePath: string, format: OutputFormat): Promise<ShardEntry[]> {
  if (format === 'npy') {
    return [{ name: basename(samplePath), sourcePath: samplePath }];
  }

  const prefix = basename(samplePath);
  const files = await listFilesRecursive(samplePath);
  return files.map((file) => ({
    name: posix.join(prefix, ...relative(samplePath, file).split(sep)),
    sourcePath: file,
  }));
}

function addEntry(pack: Pack, name: string, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    pack.entry({ name, size: data.length, mode: 0o644, type: 'file' }, data, (error) => {
      if (error) reject(error);
      else resolve();
    });
  });
}

export class ShardPacker {
  async pack(inputDir: string, outputDir: string, shardSize: number, format: OutputFormat): Promise<ShardResult> {
    const samples = await discoverSamples(inputDir, format);
    const groups = partitionSamples(samples, shardSize);
    const shards: string[] = [];

    logger.info({ inputDir, samples: samples.length, shards: groups.length, shardSize }, 'Packing shards');

    for (const [index, group] of groups.entries()) {
      const shardPath = join(outputDir, formatShardName(index));
      try {
        await this.writeShard(shardPath, group, format);
      } catch (error) {
        await this.discardPartialShard(shardPath);
        throw new ShardError(index, error);
      }
      shards.push(shardPath);
      logger.debug({ shard: shardPath, samples: group.length }, 'Shard written');
    }

    return { shardCount: shards.length, sampleCount: samples.length, shards };
  }

  private async discardPartialShard(shardPath: string): Promise<void> {
    try {
      await rm(shardPath, { force: true });
    } catch (error) {
      logger.warn({ shard: shardPath, error: errorMessage(error) }, 'Failed to remove partial shard');
    }
  }

  private async writeShard(shardPath: string, samples: string[], format: OutputFormat): Promise<void> {
    const archive = tarPack();
    const output = createWriteStream(shardPath);

    const stream: { error: Error | null } = { error: null };
    const onStreamError = (error: Error) => {
      stream.error = stream.error ?? error;
      // Releases any entry waiting on backpressure
      archive.destroy();
    };
    archive.on('error', onStreamError);
    output.on('error', onStreamError);
    const closed = new Promise<void>((resolve) => output.on('close', () => resolve()));

    archive.pipe(output);

    try {
      for (const sample of samples) {
        for (const entry of await sampleEntries(sample, format)) {
          if (stream.error) throw stream.error;
          const data = await readFile(entry.sourcePath);
          await addEntry(archive, entry.name, data);
        }
      }
      archive.finalize();
    } catch (error) {
      archive.destroy();
      output.destroy();
      await closed;
      throw new Error(`error adding samples to ${shardPath}: ${errorMessage(error)}`, { cause: error });
    }

    await closed;
    if (stream.error) {
      throw stream.error;
    }
  }
}

/**
 * Shard entry point: creates `shardDir` and packs every sample under `inputDir`
 */
export async function packShards(
  inputDir: string,
  shardDir: string,
  shardSize: number,
  format: OutputFormat,
): Promise<ShardResult> {
  const params = validateSchema(packShardsSchema, { inputDir, shardDir, shardSize, format });
  await mkdir(params.shardDir, { recursive: true });
  return new ShardPacker().pack(params.inputDir, params.shardDir, params.shardSize, params.format);
}
