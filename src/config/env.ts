import { availableParallelism, tmpdir } from "os";
import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),

  // Decode engine
  FFMPEG_PATH: z.string().default("ffmpeg"),
  FFPROBE_PATH: z.string().default("ffprobe"),
  TEMP_DIR: z.string().default(tmpdir()),
  JPEG_QUALITY: z
    .string()
    .default("90")
    .transform(Number)
    .pipe(z.number().int().min(1).max(100)),

  // Pipeline defaults (CLI flags override these)
  DEFAULT_WORKERS: z
    .string()
    .default(String(availableParallelism()))
    .transform(Number)
    .pipe(z.number().int().min(1)),
  DEFAULT_FPS: z
    .string()
    .default("8")
    .transform(Number)
    .pipe(z.number().int().positive()),
  DEFAULT_SIZE: z.string().default("256x256"),
  DEFAULT_FRAMES: z
    .string()
    .default("16")
    .transform(Number)
    .pipe(z.number().int().positive()),
  DEFAULT_SHARD_SIZE: z
    .string()
    .default("1000")
    .transform(Number)
    .pipe(z.number().int().positive()),
});

function loadEnv() {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error("Invalid environment variables:");
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

export const env = loadEnv();
export type Env = z.infer<typeof envSchema>;
