import { describe, it, expect } from 'vitest';
import { decodeBase64Strict } from '../../../src/modules/contributions/helpers/decode-upload';

describe('decodeBase64Strict', () => {
  it('decodes padded and unpadded input', () => {
    expect(decodeBase64Strict('aGVsbG8=')?.toString('utf8')).toBe('hello');
    expect(decodeBase64Strict('aGVsbG8')?.toString('utf8')).toBe('hello');
  });

  it('ignores whitespace and line breaks', () => {
    expect(decodeBase64Strict('aGVs\nbG8=')?.toString('utf8')).toBe('hello');
  });

  it('rejects characters outside the alphabet', () => {
    expect(decodeBase64Strict('not base64!')).toBeNull();
    expect(decodeBase64Strict('aGVs-bG8')).toBeNull();
  });

  it('rejects empty input and impossible lengths', () => {
    expect(decodeBase64Strict('')).toBeNull();
    expect(decodeBase64Strict('   ')).toBeNull();
    expect(decodeBase64Strict('aGVsb')).toBeNull();
  });
});
