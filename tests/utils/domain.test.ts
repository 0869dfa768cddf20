import { describe, it, expect } from 'vitest';
import { isSameDomain } from '@/lib/utils/domain';

describe('isSameDomain', () => {
  it('ignores a leading www. on either side', () => {
    expect(isSameDomain('https://www.example.co.jp/about', 'https://example.co.jp')).toBe(true);
    expect(isSameDomain('https://example.co.jp/about', 'https://www.example.co.jp/')).toBe(true);
  });

  it('compares hosts case-insensitively', () => {
    expect(isSameDomain('https://EXAMPLE.com/a', 'https://www.example.com/')).toBe(true);
  });

  it('treats the port as part of the host', () => {
    expect(isSameDomain('https://example.com:8443/a', 'https://example.com')).toBe(false);
    expect(isSameDomain('http://example.com:8080/a', 'http://example.com:8080/')).toBe(true);
  });

  it('rejects subdomains and other hosts', () => {
    expect(isSameDomain('https://shop.example.com/', 'https://example.com')).toBe(false);
    expect(isSameDomain('https://example.org/', 'https://example.com')).toBe(false);
  });

  it('rejects non-http schemes', () => {
    expect(isSameDomain('ftp://example.com/file', 'https://example.com')).toBe(false);
    expect(isSameDomain('mailto:info@example.com', 'https://example.com')).toBe(false);
  });

  it('returns false for malformed input instead of throwing', () => {
    expect(isSameDomain('not a url', 'https://example.com')).toBe(false);
    expect(isSameDomain('https://example.com/', '::::')).toBe(false);
  });
});
