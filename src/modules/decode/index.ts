/**
 * Decode Module
 * External decoder contract and its ffmpeg implementation
 */

export * from './decode.types';
export * from './decode.filters';
export * from './decode.options';
export * from './decode.ffmpeg.service';
