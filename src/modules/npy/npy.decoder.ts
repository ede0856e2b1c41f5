import { readFile } from 'fs/promises';
import { NpyFormatError } from '@/utils/errors';
import { NPY_MAGIC, NPY_PREAMBLE_LENGTH, type NpyArray, type NpyHeader } from './npy.types';

const DESCR_PATTERN = /'descr':\s*'([^']+)'/;
const FORTRAN_PATTERN = /'fortran_order':\s*(True|False)/;
const SHAPE_PATTERN = /'shape':\s*\(([^)]*)\)/;

export function parseNpyHeader(buffer: Buffer): NpyHeader {
  if (buffer.length < NPY_PREAMBLE_LENGTH || !buffer.subarray(0, NPY_MAGIC.length).equals(NPY_MAGIC)) {
    throw new NpyFormatError('missing NPY magic string');
  }

  const major = buffer[6];
  const minor = buffer[7];

  let headerLength: number;
  let headerStart: number;
  if (major === 1) {
    headerLength = buffer.readUInt16LE(8);
    headerStart = NPY_PREAMBLE_LENGTH;
  } else if (major === 2 || major === 3) {
    if (buffer.length < 12) {
      throw new NpyFormatError('truncated NPY preamble');
    }
    headerLength = buffer.readUInt32LE(8);
    headerStart = 12;
  } else {
    throw new NpyFormatError(`unsupported NPY version ${major}.${minor}`);
  }

  const dataOffset = headerStart + headerLength;
  if (buffer.length < dataOffset) {
    throw new NpyFormatError('truncated NPY header');
  }

  const text = buffer.subarray(headerStart, dataOffset).toString('latin1');

  const descr = DESCR_PATTERN.exec(text);
  const fortran = FORTRAN_PATTERN.exec(text);
  const shape = SHAPE_PATTERN.exec(text);
  if (!descr || !fortran || !shape) {
    throw new NpyFormatError(`malformed NPY header: ${text.trim()}`);
  }

  const dims = shape[1]
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => {
      const dim = Number(part);
      if (!Number.isSafeInteger(dim) || dim < 0) {
        throw new NpyFormatError(`invalid shape dimension: ${part}`);
      }
      return dim;
    });

  return {
    version: [major, minor],
    dtype: descr[1],
    fortranOrder: fortran[1] === 'True',
    shape: dims,
    dataOffset,
  };
}

export function decodeNpy(buffer: Buffer): NpyArray {
  const header = parseNpyHeader(buffer);
  return { header, data: buffer.subarray(header.dataOffset) };
}

export async function readNpyFile(filePath: string): Promise<NpyArray> {
  return decodeNpy(await readFile(filePath));
}
