import { z } from 'zod';
import { env } from '@/config/env';
import { ValidationError } from '@/utils/errors';
import { validateSchema } from '@/utils/validation';
import { chunkPolicySchema, outputFormatSchema } from '@/modules/pipeline/pipeline.schemas';

const FLAGS = [
  'tar',
  'out',
  'fps',
  'size',
  'format',
  'frames',
  'policy',
  'workers',
  'shard-size',
  'shard-dir',
] as const;

type Flag = (typeof FLAGS)[number];

function isFlag(name: string): name is Flag {
  return FLAGS.some((flag) => flag === name);
}

const cliSchema = z.object({
  tar: z.string().optional(),
  out: z.string().min(1).default('output'),
  fps: z.coerce.number().int().positive().default(env.DEFAULT_FPS),
  size: z.string().default(env.DEFAULT_SIZE),
  format: outputFormatSchema.default('jpg'),
  frames: z.coerce.number().int().positive().default(env.DEFAULT_FRAMES),
  policy: chunkPolicySchema.default('truncate'),
  workers: z.coerce.number().int().positive().default(env.DEFAULT_WORKERS),
  'shard-size': z.coerce.number().int().positive().default(env.DEFAULT_SHARD_SIZE),
  'shard-dir': z.string().optional(),
  help: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof cliSchema>;

export const USAGE = `Usage: vidchunk --tar <archive.tar> [OPTIONS]

Options:
  --tar <path>          Input .tar archive of video clips
  --out <dir>           Directory for chunk output (default: output)
  --fps <n>             Target frames per second (default: ${env.DEFAULT_FPS})
  --size <WxH>          Resize frames to this resolution (default: ${env.DEFAULT_SIZE})
  --format <jpg|npy>    Output format (default: jpg)
  --frames <n>          Frames per chunk (default: ${env.DEFAULT_FRAMES})
  --policy <truncate|pad>
                        Drop a short trailing chunk, or zero-pad it (default: truncate)
  --workers <n>         Clips processed in parallel (default: ${env.DEFAULT_WORKERS})
  --shard-size <n>      Chunks per shard (default: ${env.DEFAULT_SHARD_SIZE})
  --shard-dir <dir>     Write WebDataset shards to this directory
  --help, -h            Show this help message
`;

/**
 * Accepts `--flag value` and `--flag=value`
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const raw: Partial<Record<Flag, string>> & { help?: boolean } = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      raw.help = true;
      continue;
    }
    if (!arg.startsWith('--')) {
      throw new ValidationError(`unexpected argument: ${arg}`);
    }

    const [name, inlineValue] = splitFlag(arg.slice(2));
    if (!isFlag(name)) {
      throw new ValidationError(`unknown flag: --${name}`);
    }

    let value = inlineValue;
    if (value === undefined) {
      value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new ValidationError(`missing value for --${name}`);
      }
      i++;
    }
    raw[name] = value;
  }

  return validateSchema(cliSchema, raw);
}

function splitFlag(flag: string): [string, string | undefined] {
  const eq = flag.indexOf('=');
  return eq === -1 ? [flag, undefined] : [flag.slice(0, eq), flag.slice(eq + 1)];
}
