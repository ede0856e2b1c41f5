/**
 * Command-line driver: archive -> chunks -> optional shards
 */

import { existsSync } from 'fs';
import { logger } from '@/utils/logger';
import { AppError, BatchProcessingError, errorMessage } from '@/utils/errors';
import { extractClipsFromTar } from '@/modules/archive';
import type { DecodeEngine } from '@/modules/decode';
import { processAll } from '@/modules/pipeline';
import { packShards } from '@/modules/sharding';
import { USAGE, parseCliArgs, type CliOptions } from './cli.args';

export interface CliDeps {
  engine?: DecodeEngine;
  print?: (text: string) => void;
}

/**
 * Runs the CLI and resolves to the process exit code
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const print = deps.print ?? ((text: string) => process.stdout.write(text));

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    print(`Error: ${errorMessage(error)}\n\n${USAGE}`);
    return 1;
  }

  if (options.help) {
    print(USAGE);
    return 0;
  }

  try {
    await processArchive(options, deps.engine);

    if (options['shard-dir']) {
      const result = await packShards(options.out, options['shard-dir'], options['shard-size'], options.format);
      logger.info(
        { shards: result.shardCount, samples: result.sampleCount, shardDir: options['shard-dir'] },
        'Created WebDataset shards',
      );
    }
    return 0;
  } catch (error) {
    if (error instanceof BatchProcessingError) {
      for (const failure of error.failures) {
        logger.error({ key: failure.key, error: failure.error.message }, 'Clip failed');
      }
      logger.error({ failed: error.failedKeys.length }, 'Error processing clips');
    } else if (error instanceof AppError) {
      logger.error({ code: error.code, error: error.message }, 'Run failed');
    } else {
      logger.error({ error }, 'Run failed');
    }
    return 1;
  }
}

async function processArchive(options: CliOptions, engine: DecodeEngine | undefined): Promise<void> {
  if (!options.tar) {
    logger.info('Skipping clip processing as no input file specified');
    return;
  }
  if (!existsSync(options.tar)) {
    logger.warn({ tar: options.tar }, 'Skipping clip processing as input file does not exist');
    return;
  }

  const clips = await extractClipsFromTar(options.tar);
  logger.info({ clips: clips.length, workers: options.workers }, 'Processing clips');

  const result = await processAll(
    clips,
    {
      outputDir: options.out,
      fps: options.fps,
      size: options.size,
      format: options.format,
      targetFrames: options.frames,
      workers: options.workers,
      policy: options.policy,
    },
    {
      engine,
      hooks: {
        onClipDone: ({ key, completed, total, error }) => {
          logger.debug({ key, completed, total, failed: error !== undefined }, 'Clip done');
        },
      },
    },
  );

  logger.info(
    { clips: result.total, chunks: result.chunksWritten, timeMs: result.durationMs },
    'Processed clips successfully',
  );
}
