import { describe, it, expect } from 'vitest';
import {
  describeLanguage,
  detectLanguage,
  getAllLanguages,
  getLanguage,
  getSupportedExtensions,
  isSupportedLanguage,
} from './registry.js';
import type { SupportedLanguage } from './registry.js';

describe('Language Registry', () => {
  describe('detectLanguage', () => {
    it('should detect C++ sources and headers', () => {
      expect(detectLanguage('src/main.cpp')).toBe('cpp');
      expect(detectLanguage('src/util.cc')).toBe('cpp');
      expect(detectLanguage('include/util.hpp')).toBe('cpp');
      expect(detectLanguage('include/util.h')).toBe('cpp');
    });

    it('should detect Dart and Swift files', () => {
      expect(detectLanguage('lib/main.dart')).toBe('dart');
      expect(detectLanguage('Sources/App.swift')).toBe('swift');
    });

    it('should return null for unsupported extensions', () => {
      expect(detectLanguage('main.py')).toBeNull();
      expect(detectLanguage('README.md')).toBeNull();
      expect(detectLanguage('Makefile')).toBeNull();
    });

    it('should be case-insensitive for extensions', () => {
      expect(detectLanguage('MAIN.CPP')).toBe('cpp');
      expect(detectLanguage('Widget.Dart')).toBe('dart');
    });
  });

  describe('getLanguage', () => {
    it('should return a definition for each supported language', () => {
      const languages: SupportedLanguage[] = ['cpp', 'dart', 'swift'];
      for (const lang of languages) {
        const def = getLanguage(lang);
        expect(def.id).toBe(lang);
        expect(def.extensions.length).toBeGreaterThan(0);
        expect(def.createParser).toBeTypeOf('function');
      }
    });

    it('should use tree-sitter for C++ and patterns for Dart and Swift', () => {
      expect(getLanguage('cpp').backend).toBe('tree-sitter');
      expect(getLanguage('dart').backend).toBe('regex');
      expect(getLanguage('swift').backend).toBe('regex');
    });
  });

  describe('isSupportedLanguage', () => {
    it('should accept registered ids only', () => {
      expect(isSupportedLanguage('cpp')).toBe(true);
      expect(isSupportedLanguage('swift')).toBe(true);
      expect(isSupportedLanguage('python')).toBe(false);
      expect(isSupportedLanguage('')).toBe(false);
    });
  });

  describe('getAllLanguages', () => {
    it('should return the three registered languages in order', () => {
      expect(getAllLanguages().map(d => d.id)).toEqual(['cpp', 'dart', 'swift']);
    });

    it('should return a fresh array on each call', () => {
      const a = getAllLanguages();
      const b = getAllLanguages();
      expect(a).not.toBe(b);
      expect(a).toEqual(b);
    });

    it('should have no duplicate IDs or extensions', () => {
      const extensions = getSupportedExtensions();
      expect(new Set(extensions).size).toBe(extensions.length);
    });
  });

  describe('describeLanguage', () => {
    it('should expose name, display name, extensions and backend', () => {
      expect(describeLanguage(getLanguage('dart'))).toEqual({
        name: 'dart',
        displayName: 'Dart',
        extensions: ['dart'],
        parser: 'regex',
      });
    });
  });
});
