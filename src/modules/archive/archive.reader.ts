/**
 * Tar archive reader
 * Pulls video entries out of an input archive into memory
 */

import { createReadStream } from 'fs';
import { extname } from 'path';
import { extract } from 'tar-stream';
import { logger } from '@/utils/logger';
import { fileStem, isHiddenFile, isVideoFile } from '@/utils/file-utils';
import type { Clip } from './archive.types';

/**
 * Regular, non-hidden entries with a supported video extension
 */
export function isClipEntry(name: string, type: string | null | undefined): boolean {
  return (type === 'file' || type === undefined || type === null) && isVideoFile(name) && !isHiddenFile(name);
}

/**
 * Reads every clip in archive order. The key is the entry's base name
 * without its extension.
 */
export function extractClipsFromTar(tarPath: string): Promise<Clip[]> {
  return new Promise((resolve, reject) => {
    const extractor = extract();
    const clips: Clip[] = [];
    let skipped = 0;

    extractor.on('entry', (header, stream, next) => {
      if (!isClipEntry(header.name, header.type)) {
        skipped++;
        stream.on('end', () => next());
        stream.resume();
        return;
      }

      const parts: Buffer[] = [];
      stream.on('data', (part: Buffer) => parts.push(part));
      stream.on('end', () => {
        clips.push({
          key: fileStem(header.name),
          data: Buffer.concat(parts),
          extension: extname(header.name).toLowerCase(),
        });
        next();
      });
      stream.on('error', reject);
    });

    extractor.on('finish', () => {
      logger.debug({ tarPath, clips: clips.length, skipped }, 'Archive read');
      resolve(clips);
    });
    extractor.on('error', reject);

    createReadStream(tarPath).on('error', reject).pipe(extractor);
  });
}
