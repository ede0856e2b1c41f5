import { describe, it, expect } from 'vitest';
import { formatDimensions, frameByteSize, parseDimensions } from '@/utils/dimensions';
import { ValidationError } from '@/utils/errors';

describe('dimensions', () => {
  describe('parseDimensions', () => {
    it('should parse WxH strings', () => {
      expect(parseDimensions('256x256')).toEqual({ width: 256, height: 256 });
      expect(parseDimensions('320x240')).toEqual({ width: 320, height: 240 });
    });

    it('should reject a wrong separator count', () => {
      expect(() => parseDimensions('256')).toThrow('invalid size format: 256');
      expect(() => parseDimensions('1x2x3')).toThrow('invalid size format: 1x2x3');
    });

    it('should reject non-numeric components', () => {
      expect(() => parseDimensions('abcx256')).toThrow('invalid width: abc');
      expect(() => parseDimensions('256xabc')).toThrow('invalid height: abc');
      expect(() => parseDimensions('25.5x10')).toThrow(ValidationError);
      expect(() => parseDimensions('-5x10')).toThrow(ValidationError);
    });

    it('should reject zero-sized frames', () => {
      expect(() => parseDimensions('0x256')).toThrow('invalid width: 0');
    });
  });

  it('should format and size frames', () => {
    expect(formatDimensions({ width: 64, height: 48 })).toBe('64x48');
    expect(frameByteSize({ width: 64, height: 48 }, 3)).toBe(9216);
  });
});
