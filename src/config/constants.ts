export const SUPPORTED_VIDEO_FORMATS = [
  '.mp4',
  '.mkv',
  '.mov',
  '.wmv',
  '.avi',
  '.flv',
  '.webm',
  '.m4v',
  '.mpg',
  '.mpeg',
] as const;

export const OUTPUT_FORMATS = ['jpg', 'npy'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const CHUNK_POLICIES = ['truncate', 'pad'] as const;
export type ChunkPolicy = (typeof CHUNK_POLICIES)[number];

// RGB24
export const RGB_CHANNELS = 3;

export const CHUNK_INDEX_DIGITS = 5;
export const MAX_CHUNKS_PER_CLIP = 10 ** CHUNK_INDEX_DIGITS;
export const FRAME_INDEX_DIGITS = 3;
export const SHARD_INDEX_DIGITS = 5;

export const NPY_EXTENSION = '.npy';
export const CHUNK_METADATA_FILENAME = 'metadata.json';
export const DECODED_FRAME_PREFIX = 'frame_';
