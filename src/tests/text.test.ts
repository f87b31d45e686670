import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { fromMapping } from '../attributes';
import { MetadataMessage } from '../metadataMessage';
import {
  buildDescription,
  cleanDescription,
  getClassifiers,
  getDeclaredLicense,
  getDescription,
  getKeywords
} from '../text';

describe('buildDescription', () => {
  it('joins summary and body with a newline', () => {
    expect(buildDescription('Summary', 'Body')).toBe('Summary\nBody');
  });

  it('returns whichever part is present', () => {
    expect(buildDescription('  ', 'Body')).toBe('Body');
    expect(buildDescription('Summary')).toBe('Summary');
    expect(buildDescription()).toBeUndefined();
  });
});

describe('cleanDescription', () => {
  it('strips eight-space continuation padding', () => {
    const cleaned = cleanDescription('line one\n        line two\n        line three');
    expect(cleaned).toBe('line one\nline two\nline three');
    expect(cleanDescription(cleaned)).toBe(cleaned);
  });

  it('leaves text whose second line is indented past the padding', () => {
    const text = `a\n${' '.repeat(16)}b`;
    expect(cleanDescription(text)).toBe(text);
    expect(cleanDescription(cleanDescription(text))).toBe(text);
  });

  it('leaves shallower indentation alone', () => {
    expect(cleanDescription('a\n  b')).toBe('a\n  b');
  });

  it('returns an empty string for missing text', () => {
    expect(cleanDescription(undefined)).toBe('');
  });
});

describe('getDescription', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pymeta-text-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('uses the Description field when there is no payload', () => {
    const message = MetadataMessage.parse('Summary: Short\nDescription: Long\n');
    expect(getDescription(message)).toBe('Short\nLong');
  });

  it('prefers the payload over the Description field', () => {
    const message = MetadataMessage.parse('Summary: Short\nDescription: ignored\n\nFrom payload\n');
    expect(getDescription(message)).toBe('Short\nFrom payload');
  });

  it('reads a DESCRIPTION.rst next to the descriptor', () => {
    fs.writeFileSync(path.join(tempDir, 'DESCRIPTION.rst'), 'Legacy body\n');
    const source = fromMapping({ summary: 'Short' });
    expect(getDescription(source, path.join(tempDir, 'PKG-INFO'))).toBe('Short\nLegacy body');
  });
});

describe('licenses and keywords', () => {
  const message = MetadataMessage.parse(
    [
      'License: UNKNOWN',
      'Keywords: alpha, beta,alpha',
      'Classifier: License :: OSI Approved :: MIT License',
      'Classifier: Topic :: Utilities',
      ''
    ].join('\n')
  );

  it('splits license classifiers from the rest', () => {
    expect(getClassifiers(message)).toEqual({
      license: ['License :: OSI Approved :: MIT License'],
      other: ['Topic :: Utilities']
    });
  });

  it('drops the UNKNOWN license placeholder', () => {
    expect(getDeclaredLicense(message)).toEqual({ classifiers: ['License :: OSI Approved :: MIT License'] });
  });

  it('folds non-license classifiers into keywords without duplicates', () => {
    expect(getKeywords(message)).toEqual(['alpha', 'beta', 'Topic :: Utilities']);
  });

  it('accepts keyword lists', () => {
    expect(getKeywords(fromMapping({ keywords: ['x', ' y ', 3] }))).toEqual(['x', 'y']);
  });
});
