import { describe, it, expect } from 'vitest';
import { hashContent } from './content-hash.js';

describe('hashContent', () => {
  it('should return the first 16 hex characters of the SHA-256 digest', () => {
    expect(hashContent('hello')).toBe('2cf24dba5fb0a30e');
  });

  it('should be stable for equal content', () => {
    expect(hashContent('class A {};')).toBe(hashContent('class A {};'));
  });

  it('should differ for different content', () => {
    expect(hashContent('class A {};')).not.toBe(hashContent('class B {};'));
  });

  it('should hash empty content', () => {
    expect(hashContent('')).toMatch(/^[0-9a-f]{16}$/);
  });
});
