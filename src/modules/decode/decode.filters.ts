import type { Dimensions } from '@/utils/dimensions';

/**
 * A video filter that renders to one or more ffmpeg `-vf` filter expressions
 */
export interface VideoFilter {
  toFilterArgs(): string[];
}

export function fpsFilter(fps: number): VideoFilter {
  return { toFilterArgs: () => [`fps=${fps}`] };
}

export function scaleFilter({ width, height }: Dimensions): VideoFilter {
  return { toFilterArgs: () => [`scale=${width}:${height}`] };
}

/**
 * Joins filters into one chain: `fps=8,scale=256:256`
 */
export function composeFilters(...filters: VideoFilter[]): string {
  return filters.flatMap((filter) => filter.toFilterArgs()).join(',');
}
