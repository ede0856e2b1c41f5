/**
 * NPY (numpy array file) types
 * Only the subset written by this project is modelled: v1.0 headers, C order.
 */

export const NPY_MAGIC = Buffer.from([0x93, 0x4e, 0x55, 0x4d, 0x50, 0x59]); // \x93NUMPY

// magic (6) + version (2) + header length (2)
export const NPY_PREAMBLE_LENGTH = 10;
export const NPY_HEADER_ALIGNMENT = 16;

export type NpyShape = readonly number[];

export interface NpyHeader {
  version: [number, number];
  dtype: string; // e.g. '<u1'
  fortranOrder: boolean;
  shape: number[];
  dataOffset: number; // Byte offset of the payload
}

export interface NpyArray {
  header: NpyHeader;
  data: Buffer;
}
