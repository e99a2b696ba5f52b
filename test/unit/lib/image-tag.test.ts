import { describe, it, expect } from '@jest/globals';
import { formatImageReference, formatImageVersion } from '../../../src/lib/image-tag';

describe('image tags', () => {
  it('should produce 1.0.<run number>', () => {
    expect(formatImageVersion(1)).toBe('1.0.1');
    expect(formatImageVersion(237)).toBe('1.0.237');
  });

  it('should reject run numbers that are not positive integers', () => {
    expect(() => formatImageVersion(0)).toThrow(RangeError);
    expect(() => formatImageVersion(1.5)).toThrow(RangeError);
  });

  it('should build the full image reference', () => {
    expect(
      formatImageReference('123456789012.dkr.ecr.ap-northeast-1.amazonaws.com/', 'teradata-mcp', 42),
    ).toBe('123456789012.dkr.ecr.ap-northeast-1.amazonaws.com/teradata-mcp:1.0.42');
  });
});
