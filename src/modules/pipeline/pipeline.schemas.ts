import { z } from 'zod';
import { CHUNK_POLICIES, OUTPUT_FORMATS } from '@/config/constants';
import { env } from '@/config/env';

export const outputFormatSchema = z.enum(OUTPUT_FORMATS, {
  errorMap: () => ({ message: `unsupported format. Supported formats are: ${OUTPUT_FORMATS.join(', ')}` }),
});

export const chunkPolicySchema = z.enum(CHUNK_POLICIES);

export const processAllSchema = z.object({
  outputDir: z.string().min(1),
  fps: z.number().int().positive().default(env.DEFAULT_FPS),
  size: z.string().default(env.DEFAULT_SIZE),
  format: outputFormatSchema,
  targetFrames: z.number().int().positive().default(env.DEFAULT_FRAMES),
  workers: z.number().int().default(env.DEFAULT_WORKERS),
  policy: chunkPolicySchema.default('truncate'),
});

export type ProcessAllOptions = z.input<typeof processAllSchema>;

export const packShardsSchema = z.object({
  inputDir: z.string().min(1),
  shardDir: z.string().min(1),
  shardSize: z.number().int().positive(),
  format: outputFormatSchema,
});

// Keys become directory names under the output root
export const clipKeySchema = z
  .string()
  .min(1, 'clip key must not be empty')
  .refine((key) => key !== '.' && key !== '..' && !/[\\/]/.test(key), {
    message: 'clip key must be a plain file name',
  });
