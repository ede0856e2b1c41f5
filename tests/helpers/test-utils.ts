import { mkdtemp, mkdir, readdir, rm, writeFile } from 'fs/promises';
import { createReadStream } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { extract, pack } from 'tar-stream';
import { DECODED_FRAME_PREFIX, RGB_CHANNELS } from '@/config/constants';
import type { DecodeEngine, DecodeRequest, FrameStream } from '@/modules/decode';

export async function createTempDir(prefix = 'vidchunk-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(directory: string): Promise<void> {
  await rm(directory, { recursive: true, force: true });
}

/**
 * Raw RGB24 buffer where every byte of frame i equals i % 256
 */
export function rawFrames(count: number, width: number, height: number): Buffer {
  const frameSize = width * height * RGB_CHANNELS;
  const data = Buffer.alloc(count * frameSize);
  for (let i = 0; i < count; i++) {
    data.fill(i % 256, i * frameSize, (i + 1) * frameSize);
  }
  return data;
}

/**
 * Writes `frame_000001.jpg`... with the frame number as content
 */
export async function writeFrameFiles(directory: string, count: number, extension = 'jpg'): Promise<string[]> {
  await mkdir(directory, { recursive: true });
  const files: string[] = [];
  for (let i = 1; i <= count; i++) {
    const file = join(directory, `${DECODED_FRAME_PREFIX}${String(i).padStart(6, '0')}.${extension}`);
    await writeFile(file, `frame-${i}`);
    files.push(file);
  }
  return files;
}

export interface FakeDecodeEngineOptions {
  frames: Record<string, number> | number; // Frames produced per clip key
  failing?: string[]; // Clip keys whose decode rejects
  delayMs?: number;
}

/**
 * In-process stand-in for ffmpeg
 */
export class FakeDecodeEngine implements DecodeEngine {
  readonly requests: DecodeRequest[] = [];
  readonly inputsSeen: string[] = [];
  active = 0;
  maxActive = 0;

  constructor(private options: FakeDecodeEngineOptions) {}

  async decode(request: DecodeRequest): Promise<FrameStream> {
    this.requests.push(request);
    this.inputsSeen.push(request.inputPath);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);

    try {
      if (this.options.delayMs) {
        await new Promise((resolve) => setTimeout(resolve, this.options.delayMs));
      }
      if (this.options.failing?.includes(request.clipKey)) {
        throw new Error('ffmpeg exited with code 1');
      }

      const count =
        typeof this.options.frames === 'number'
          ? this.options.frames
          : (this.options.frames[request.clipKey] ?? 0);

      if (request.mode === 'raw') {
        const { width, height } = request.dimensions;
        return {
          kind: 'raw',
          data: rawFrames(count, width, height),
          dimensions: request.dimensions,
          sourceFps: 30,
        };
      }

      const extension = request.imageExtension ?? 'jpg';
      const files = await writeFrameFiles(request.workDir, count, extension);
      return {
        kind: 'images',
        directory: request.workDir,
        files,
        extension,
        dimensions: request.dimensions,
        sourceFps: 30,
      };
    } finally {
      this.active--;
    }
  }
}

export interface TarFixtureEntry {
  name: string;
  data?: Buffer | string;
  type?: 'file' | 'directory';
}

export function buildTar(entries: TarFixtureEntry[]): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const archive = pack();
    const parts: Buffer[] = [];
    archive.on('data', (part: Buffer) => parts.push(part));
    archive.on('end', () => resolve(Buffer.concat(parts)));
    archive.on('error', reject);

    for (const entry of entries) {
      if (entry.type === 'directory') {
        archive.entry({ name: entry.name, type: 'directory' });
      } else {
        archive.entry({ name: entry.name }, entry.data ?? '');
      }
    }
    archive.finalize();
  });
}

export interface TarEntryContent {
  name: string;
  data: Buffer;
}

export function readTarEntries(tarPath: string): Promise<TarEntryContent[]> {
  return new Promise((resolve, reject) => {
    const extractor = extract();
    const entries: TarEntryContent[] = [];

    extractor.on('entry', (header, stream, next) => {
      const parts: Buffer[] = [];
      stream.on('data', (part: Buffer) => parts.push(part));
      stream.on('end', () => {
        entries.push({ name: header.name, data: Buffer.concat(parts) });
        next();
      });
      stream.on('error', reject);
    });
    extractor.on('finish', () => resolve(entries));
    extractor.on('error', reject);

    createReadStream(tarPath).on('error', reject).pipe(extractor);
  });
}

export async function listDir(directory: string): Promise<string[]> {
  return (await readdir(directory)).sort();
}
