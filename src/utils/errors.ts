/**
 * Application error hierarchy.
 *
 * Every error raised by the pipeline extends AppError so callers can tell
 * input validation failures (fatal, raised before any work starts) apart from
 * per-clip and per-shard failures (collected and reported).
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string = 'INTERNAL_ERROR',
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
  }
}

export class DecodeError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'DECODE_ERROR', { cause });
  }
}

export class FrameStreamError extends AppError {
  constructor(message: string) {
    super(message, 'FRAME_STREAM_ERROR');
  }
}

export class SerializationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'SERIALIZATION_ERROR', { cause });
  }
}

export class ChunkIndexOverflowError extends AppError {
  constructor(chunkCount: number, maxChunks: number) {
    super(
      `Clip needs ${chunkCount} chunks but at most ${maxChunks} fit the chunk naming scheme`,
      'CHUNK_INDEX_OVERFLOW',
    );
  }
}

export class NpyFormatError extends AppError {
  constructor(message: string) {
    super(message, 'NPY_FORMAT_ERROR');
  }
}

export class ShardError extends AppError {
  constructor(
    public readonly shardIndex: number,
    cause: unknown,
  ) {
    super(
      `error creating shard ${shardIndex}: ${errorMessage(cause)}`,
      'SHARD_ERROR',
      { cause },
    );
  }
}

export interface ClipFailure {
  key: string;
  error: Error;
}

export class BatchProcessingError extends AppError {
  constructor(public readonly failures: ClipFailure[]) {
    super(
      `encountered ${failures.length} errors: ${failures
        .map((failure) => `${failure.key}: ${failure.error.message}`)
        .join('; ')}`,
      'BATCH_ERROR',
    );
  }

  get failedKeys(): string[] {
    return this.failures.map((failure) => failure.key);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
