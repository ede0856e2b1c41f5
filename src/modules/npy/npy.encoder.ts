/**
 * NPY encoder
 * Writes unsigned 8-bit arrays in the NPY v1.0 layout read by numpy.load
 */

import { writeFile } from 'fs/promises';
import { NpyFormatError } from '@/utils/errors';
import {
  NPY_HEADER_ALIGNMENT,
  NPY_MAGIC,
  NPY_PREAMBLE_LENGTH,
  type NpyShape,
} from './npy.types';

const NPY_VERSION = Buffer.from([0x01, 0x00]);
const MAX_V1_HEADER_LENGTH = 0xffff;

/**
 * Python tuple literal for a shape. A single dimension keeps its trailing
 * comma, `(5,)`, since `(5)` is an int rather than a tuple.
 */
export function formatShape(shape: NpyShape): string {
  if (shape.length === 1) {
    return `(${shape[0]},)`;
  }
  return `(${shape.join(', ')})`;
}

export function buildHeaderDictionary(shape: NpyShape): string {
  return `{'descr': '<u1', 'fortran_order': False, 'shape': ${formatShape(shape)}}`;
}

/**
 * Full header: magic, version, little-endian uint16 length, dictionary and
 * space padding. `10 + dictionary + padding` is a multiple of 16.
 */
export function createNpyHeader(shape: NpyShape): Buffer {
  for (const dim of shape) {
    if (!Number.isSafeInteger(dim) || dim < 0) {
      throw new NpyFormatError(`invalid shape dimension: ${dim}`);
    }
  }

  const dictionary = buildHeaderDictionary(shape);
  const unpadded = NPY_PREAMBLE_LENGTH + dictionary.length;
  const padding = (NPY_HEADER_ALIGNMENT - (unpadded % NPY_HEADER_ALIGNMENT)) % NPY_HEADER_ALIGNMENT;
  const headerLength = dictionary.length + padding;

  if (headerLength > MAX_V1_HEADER_LENGTH) {
    throw new NpyFormatError(`header too long for NPY v1.0: ${headerLength} bytes`);
  }

  const lengthField = Buffer.alloc(2);
  lengthField.writeUInt16LE(headerLength, 0);

  return Buffer.concat([
    NPY_MAGIC,
    NPY_VERSION,
    lengthField,
    Buffer.from(dictionary, 'latin1'),
    Buffer.alloc(padding, 0x20),
  ]);
}

/**
 * Header followed by the payload. The payload length is not checked against
 * the shape; callers size it.
 */
export function encodeNpy(data: Uint8Array, shape: NpyShape): Buffer {
  return Buffer.concat([createNpyHeader(shape), data]);
}

export async function writeNpyFile(filePath: string, data: Uint8Array, shape: NpyShape): Promise<void> {
  await writeFile(filePath, encodeNpy(data, shape));
}
