import { describe, it, expect } from 'vitest';
import {
  OCTET_STREAM,
  guessContentType,
  resolveUploadContentType,
  resolveUrlContentType,
} from '../../../../src/shared/storage/content-type';

describe('guessContentType', () => {
  it('maps known extensions case-insensitively', () => {
    expect(guessContentType('certificate.PDF')).toBe('application/pdf');
    expect(guessContentType('photo.jpeg')).toBe('image/jpeg');
  });

  it('ignores query strings and fragments on URLs', () => {
    expect(guessContentType('https://files.test/a/cert.png?sig=abc#top')).toBe('image/png');
  });

  it('returns null without a usable extension', () => {
    expect(guessContentType('README')).toBeNull();
    expect(guessContentType('trailing.')).toBeNull();
    expect(guessContentType('archive.rar')).toBeNull();
    expect(guessContentType('https://files.test/dir.v2/file')).toBeNull();
  });
});

describe('resolveUploadContentType', () => {
  it('prefers the declared type, without parameters', () => {
    expect(
      resolveUploadContentType({ declared: 'Text/Plain; charset=utf-8', fileName: 'a.pdf' }),
    ).toBe('text/plain');
  });

  it('falls back to the file extension, then to octet-stream', () => {
    expect(resolveUploadContentType({ declared: null, fileName: 'a.pdf' })).toBe(
      'application/pdf',
    );
    expect(resolveUploadContentType({ declared: 'garbage', fileName: 'a.bin' })).toBe(
      OCTET_STREAM,
    );
  });
});

describe('resolveUrlContentType', () => {
  it('guesses from the URL only', () => {
    expect(resolveUrlContentType('https://files.test/c.xlsx')).toBe(
      'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
    );
    expect(resolveUrlContentType('https://files.test/download')).toBe(OCTET_STREAM);
  });
});
