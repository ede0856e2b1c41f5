import { ValidationError } from './errors';

export interface Dimensions {
  width: number;
  height: number;
}

const POSITIVE_INTEGER = /^[0-9]+$/;

/**
 * Parses a `WxH` size string such as `256x256`.
 * Both components must be positive decimal integers.
 */
export function parseDimensions(size: string): Dimensions {
  const parts = size.split('x');
  if (parts.length !== 2) {
    throw new ValidationError(`invalid size format: ${size}`);
  }

  const [widthPart, heightPart] = parts;
  const width = parseComponent(widthPart);
  if (width === null) {
    throw new ValidationError(`invalid width: ${widthPart}`);
  }
  const height = parseComponent(heightPart);
  if (height === null) {
    throw new ValidationError(`invalid height: ${heightPart}`);
  }

  return { width, height };
}

function parseComponent(value: string): number | null {
  if (!POSITIVE_INTEGER.test(value)) return null;
  const parsed = Number.parseInt(value, 10);
  return parsed > 0 && Number.isSafeInteger(parsed) ? parsed : null;
}

export function formatDimensions({ width, height }: Dimensions): string {
  return `${width}x${height}`;
}

/**
 * Bytes in one RGB24 frame at the given size.
 */
export function frameByteSize({ width, height }: Dimensions, channels: number): number {
  return width * height * channels;
}
