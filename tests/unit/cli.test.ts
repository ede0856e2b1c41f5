import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'fs';
import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { runCli } from '@/cli/cli';
import { USAGE } from '@/cli/cli.args';
import { FakeDecodeEngine, buildTar, createTempDir, listDir, readTarEntries, removeDir } from '../helpers/test-utils';

describe('runCli', () => {
  let dir: string;
  let tarPath: string;
  let outDir: string;
  let shardDir: string;
  let printed: string[];
  const print = (text: string) => printed.push(text);

  beforeEach(async () => {
    dir = await createTempDir();
    tarPath = join(dir, 'clips.tar');
    outDir = join(dir, 'out');
    shardDir = join(dir, 'shards');
    printed = [];

    await writeFile(
      tarPath,
      await buildTar([
        { name: 'clips/a.mp4', data: 'clip a' },
        { name: 'clips/._a.mp4', data: 'resource fork' },
        { name: 'clips/b.mp4', data: 'clip b' },
      ]),
    );
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('should print usage for --help', async () => {
    expect(await runCli(['--help'], { print })).toBe(0);
    expect(printed).toEqual([USAGE]);
  });

  it('should print the error and usage for bad arguments', async () => {
    expect(await runCli(['--bogus', '1'], { print })).toBe(1);
    expect(printed).toEqual([`Error: unknown flag: --bogus\n\n${USAGE}`]);
  });

  it('should chunk every clip and pack shards', async () => {
    const engine = new FakeDecodeEngine({ frames: { a: 5, b: 2 } });

    const code = await runCli(
      [
        '--tar',
        tarPath,
        '--out',
        outDir,
        '--format',
        'npy',
        '--size',
        '4x2',
        '--frames',
        '2',
        '--workers',
        '2',
        '--shard-dir',
        shardDir,
        '--shard-size',
        '2',
      ],
      { engine, print },
    );

    expect(code).toBe(0);
    expect(engine.requests.map((request) => request.clipKey).sort()).toEqual(['a', 'b']);
    expect(await listDir(outDir)).toEqual(['a', 'b']);
    expect(await listDir(join(outDir, 'a'))).toEqual([
      'chunk_00000.npy',
      'chunk_00000_metadata.json',
      'chunk_00001.npy',
      'chunk_00001_metadata.json',
    ]);
    expect(await listDir(join(outDir, 'b'))).toEqual(['chunk_00000.npy', 'chunk_00000_metadata.json']);

    const metadata: unknown = JSON.parse(await readFile(join(outDir, 'a', 'chunk_00001_metadata.json'), 'utf-8'));
    expect(metadata).toEqual({
      key: 'a/chunk_00001',
      fps: 8,
      frame_count: 2,
      size: [2, 4],
      is_trimmed: true,
      original_fps: 30,
    });

    expect(await listDir(shardDir)).toEqual(['shard_00000.tar', 'shard_00001.tar']);
    const first = await readTarEntries(join(shardDir, 'shard_00000.tar'));
    const second = await readTarEntries(join(shardDir, 'shard_00001.tar'));
    expect(first.map((entry) => entry.name)).toEqual(['chunk_00000.npy', 'chunk_00001.npy']);
    expect(second.map((entry) => entry.name)).toEqual(['chunk_00000.npy']);
  });

  it('should exit non-zero and skip sharding when a clip fails', async () => {
    const engine = new FakeDecodeEngine({ frames: 4, failing: ['b'] });

    const code = await runCli(
      ['--tar', tarPath, '--out', outDir, '--format', 'npy', '--size', '4x2', '--frames', '2', '--shard-dir', shardDir],
      { engine, print },
    );

    expect(code).toBe(1);
    expect(await listDir(join(outDir, 'a'))).toEqual([
      'chunk_00000.npy',
      'chunk_00000_metadata.json',
      'chunk_00001.npy',
      'chunk_00001_metadata.json',
    ]);
    expect(existsSync(shardDir)).toBe(false);
  });

  it('should exit non-zero for an invalid size', async () => {
    const engine = new FakeDecodeEngine({ frames: 4 });

    expect(await runCli(['--tar', tarPath, '--out', outDir, '--size', '4by2'], { engine, print })).toBe(1);
    expect(engine.requests).toEqual([]);
  });

  it('should skip processing when the archive does not exist', async () => {
    const engine = new FakeDecodeEngine({ frames: 4 });

    expect(await runCli(['--tar', join(dir, 'missing.tar'), '--out', outDir], { engine, print })).toBe(0);
    expect(engine.requests).toEqual([]);
    expect(existsSync(outDir)).toBe(false);
  });
});
