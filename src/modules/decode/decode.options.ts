import type { FfprobeStream } from 'fluent-ffmpeg';

/**
 * Parses an ffprobe rational such as `30000/1001`, rounded to two decimals.
 * `0/0` and malformed values give null.
 */
export function parseFrameRate(rate: string | undefined): number | null {
  if (!rate) return null;

  const [num, den] = rate.split('/').map(Number);
  if (!num || !den) return null;

  const fps = parseFloat((num / den).toFixed(2));
  return Number.isFinite(fps) && fps > 0 ? fps : null;
}

/**
 * `r_frame_rate`, falling back to `avg_frame_rate`
 */
export function streamFrameRate(
  stream: Pick<FfprobeStream, 'r_frame_rate' | 'avg_frame_rate'> | undefined,
): number | null {
  if (!stream) return null;
  return parseFrameRate(stream.r_frame_rate) ?? parseFrameRate(stream.avg_frame_rate);
}

/**
 * Maps JPEG quality 1-100 onto ffmpeg's qscale 31-2 (lower is better)
 */
export function jpegQscale(quality: number): number {
  return Math.round(2 + ((100 - quality) / 100) * 29);
}

export function qualityOptions(extension: string, quality: number): string[] {
  if (extension === 'png') {
    return [];
  }
  return ['-qscale:v', jpegQscale(quality).toString()];
}
