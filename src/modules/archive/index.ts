export * from './archive.types';
export * from './archive.reader';
