/**
 * NPY Module
 * Dense uint8 array files for chunked frame tensors
 */

export * from './npy.types';
export * from './npy.encoder';
export * from './npy.decoder';
