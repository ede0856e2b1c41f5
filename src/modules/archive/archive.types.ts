/**
 * Archive Types
 */

/**
 * One encoded video taken from the input archive
 */
export interface Clip {
  key: string; // Base name without extension, unique within a batch
  data: Buffer;
  extension?: string; // Original extension including the dot, e.g. '.mp4'
}
