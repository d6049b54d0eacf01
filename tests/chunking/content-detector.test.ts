import { describe, it, expect } from 'vitest';
import { looksLikeMarkdown } from '../../src/chunking/content-detector';

describe('looksLikeMarkdown', () => {
  it('is false for empty text', () => {
    expect(looksLikeMarkdown('')).toBe(false);
  });

  it('is false for plain prose', () => {
    expect(looksLikeMarkdown('Just a sentence. Another one follows it.')).toBe(false);
  });

  it('detects headers', () => {
    expect(looksLikeMarkdown('Intro\n## Details')).toBe(true);
  });

  it('detects list items', () => {
    expect(looksLikeMarkdown('Intro\n- first item')).toBe(true);
  });

  it('detects inline code', () => {
    expect(looksLikeMarkdown('Run `npm test` before pushing')).toBe(true);
  });

  it('detects links', () => {
    expect(looksLikeMarkdown('See [the docs](https://example.com) for more')).toBe(true);
  });

  it('detects tables', () => {
    expect(looksLikeMarkdown('| a | b |\n|---|---|')).toBe(true);
  });

  it('only samples the start of large inputs', () => {
    expect(looksLikeMarkdown(`${'x'.repeat(6000)}\n# Heading`)).toBe(false);
  });
});
