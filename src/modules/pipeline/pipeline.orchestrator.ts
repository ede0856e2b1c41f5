/**
 * Parallel Orchestrator
 * Fans a batch of clips out to a fixed number of workers sharing one queue.
 * A failing clip is recorded and never stops its siblings.
 */

import { env } from '@/config/env';
import { BatchProcessingError, ValidationError, toError, type ClipFailure } from '@/utils/errors';
import { parseDimensions } from '@/utils/dimensions';
import { validateSchema } from '@/utils/validation';
import { logger } from '@/utils/logger';
import type { Clip } from '@/modules/archive';
import { createChunkSerializer } from '@/modules/chunking';
import { FfmpegDecodeEngine, type DecodeEngine } from '@/modules/decode';
import { ClipPipeline } from './pipeline.service';
import { clipKeySchema, processAllSchema, type ProcessAllOptions } from './pipeline.schemas';
import type {
  BatchHooks,
  BatchResult,
  ClipProcessingOptions,
  ClipProcessor,
  ClipResult,
} from './pipeline.types';

export interface OrchestratorConfig {
  workers: number;
}

export class ParallelOrchestrator {
  private workers: number;

  constructor(
    private processor: ClipProcessor,
    config: OrchestratorConfig = { workers: env.DEFAULT_WORKERS },
  ) {
    this.workers = Math.max(1, Math.floor(config.workers) || 1);
  }

  get workerCount(): number {
    return this.workers;
  }

  async run(clips: Clip[], options: ClipProcessingOptions, hooks: BatchHooks = {}): Promise<BatchResult> {
    const startTime = Date.now();
    const queue = [...clips];
    const failures: ClipFailure[] = [];
    const results: ClipResult[] = [];
    let completed = 0;

    const worker = async (workerId: number): Promise<void> => {
      for (let clip = queue.shift(); clip !== undefined; clip = queue.shift()) {
        let failure: Error | undefined;
        try {
          results.push(await this.processor.process(clip, options));
        } catch (error) {
          failure = toError(error);
          failures.push({ key: clip.key, error: failure });
          logger.error({ key: clip.key, workerId, error: failure.message }, 'Clip processing failed');
        }

        completed++;
        try {
          hooks.onClipDone?.({ key: clip.key, completed, total: clips.length, error: failure });
        } catch (error) {
          logger.warn({ key: clip.key, error: toError(error).message }, 'onClipDone hook failed');
        }
      }
    };

    const poolSize = Math.min(this.workers, Math.max(clips.length, 1));
    logger.info({ clips: clips.length, workers: poolSize }, 'Batch started');

    await Promise.all(Array.from({ length: poolSize }, (_, workerId) => worker(workerId)));

    const result: BatchResult = {
      total: clips.length,
      succeeded: results.length,
      failures,
      results,
      chunksWritten: results.reduce((sum, clipResult) => sum + clipResult.chunks.length, 0),
      durationMs: Date.now() - startTime,
    };

    logger.info(
      {
        total: result.total,
        succeeded: result.succeeded,
        failed: failures.length,
        chunks: result.chunksWritten,
        timeMs: result.durationMs,
      },
      'Batch finished',
    );

    return result;
  }
}

export interface ProcessAllDeps {
  engine?: DecodeEngine;
  hooks?: BatchHooks;
}

function assertUniqueKeys(clips: Clip[]): void {
  const seen = new Set<string>();
  for (const clip of clips) {
    validateSchema(clipKeySchema, clip.key);
    if (seen.has(clip.key)) {
      throw new ValidationError(`duplicate clip key: ${clip.key}`);
    }
    seen.add(clip.key);
  }
}

/**
 * Batch entry point. Inputs are validated before any clip is touched;
 * per-clip failures come back as one BatchProcessingError.
 */
export async function processAll(
  clips: Clip[],
  options: ProcessAllOptions,
  deps: ProcessAllDeps = {},
): Promise<BatchResult> {
  const params = validateSchema(processAllSchema, options);
  const dimensions = parseDimensions(params.size);
  assertUniqueKeys(clips);

  const pipeline = new ClipPipeline(deps.engine ?? new FfmpegDecodeEngine(), createChunkSerializer(params.format));
  const orchestrator = new ParallelOrchestrator(pipeline, { workers: params.workers });

  const result = await orchestrator.run(
    clips,
    {
      outputDir: params.outputDir,
      fps: params.fps,
      dimensions,
      targetFrames: params.targetFrames,
      policy: params.policy,
    },
    deps.hooks,
  );

  if (result.failures.length > 0) {
    throw new BatchProcessingError(result.failures);
  }

  return result;
}
