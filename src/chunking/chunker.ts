import { z } from 'zod';
import type { Chunk, ChunkingOptions, ChunkingStrategy, SpecialPattern } from './types';
import { ESTIMATED_CHARS_PER_TOKEN, estimateTokens } from './token-estimator';
import { mergeSegments } from './merger';
import { CODE_SEPARATORS, MARKDOWN_SEPARATORS, sortByPriority } from './separators';
import { looksLikeMarkdown } from './content-detector';
import { describeSeparator, isBlank } from './utils';
import { CHUNKER_OPTIONS_SCHEMA, type ChunkerConfig } from '../schemas/chunking-schemas';
import type { ChunkPreset } from '../schemas/pipeline-schemas';
import { formatZodIssues } from '../schemas/issues';
import { ValidationError, handleUnknownError } from '../errors/index';
import { debug, warn } from '../output/logger';

interface OverlappedChunk {
  content: string;
  overlapLength: number;
}

function parseChunkerOptions(options: ChunkingOptions): ChunkerConfig {
  try {
    return CHUNKER_OPTIONS_SCHEMA.parse(options);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid chunker options: ${formatZodIssues(e)}`, e);
    }
    const err = handleUnknownError(e, 'Chunker option validation');
    throw new ValidationError(`Chunker option validation failed: ${err.message}`, e);
  }
}

/**
 * Splits text on a hierarchy of separators, strongest first, keeping
 * structural regions (code fences, list items, headers) whole when possible.
 *
 * Sizes are measured with {@link estimateTokens}; overlap is expressed in
 * tokens and converted to characters at {@link ESTIMATED_CHARS_PER_TOKEN}.
 */
export class RecursiveChunker implements ChunkingStrategy {
  readonly name: string;

  private readonly config: ChunkerConfig;
  private readonly patterns: SpecialPattern[];

  constructor(options: ChunkingOptions = {}, name: string = 'recursive') {
    this.name = name;
    this.config = parseChunkerOptions(options);
    this.patterns = sortByPriority(this.config.specialPatterns);
  }

  static forMarkdown(options: Omit<ChunkingOptions, 'separators'> = {}): RecursiveChunker {
    return new RecursiveChunker({ ...options, separators: MARKDOWN_SEPARATORS }, 'markdown');
  }

  static forCode(options: Omit<ChunkingOptions, 'separators'> = {}): RecursiveChunker {
    return new RecursiveChunker({ ...options, separators: CODE_SEPARATORS }, 'code');
  }

  get chunkSize(): number {
    return this.config.chunkSize;
  }

  get chunkOverlap(): number {
    return this.config.chunkOverlap;
  }

  get separators(): readonly string[] {
    return this.config.separators;
  }

  splitText(text: string): string[] {
    return this.split(text).map((c) => c.content);
  }

  chunk(text: string): Chunk[] {
    return this.split(text).map((c, index) => ({
      content: c.content,
      index,
      tokenEstimate: estimateTokens(c.content),
      overlapLength: c.overlapLength,
    }));
  }

  private split(text: string): OverlappedChunk[] {
    if (!text) {
      warn('Empty text provided to splitText');
      return [];
    }

    const { chunkSize, chunkOverlap } = this.config;
    const estimate = estimateTokens(text);
    if (estimate <= chunkSize) {
      debug(`Text fits in a single chunk (${text.length} chars, ~${estimate} tokens)`);
      return [{ content: text, overlapLength: 0 }];
    }

    debug(
      `Splitting ${text.length} chars (~${estimate} tokens) with ${this.name} chunker ` +
        `(max tokens: ${chunkSize}, overlap: ${chunkOverlap})`
    );

    const segments = this.splitBySpecialPatterns(text);
    const chunks =
      segments.length > 0
        ? mergeSegments(segments, chunkSize, (segment) => this.splitRecursive(segment, 0))
        : this.splitRecursive(text, 0);

    return this.applyOverlap(chunks);
  }

  /**
   * Returns the segments for the highest-priority pattern that matches at
   * all, or an empty list when no pattern matches.
   */
  private splitBySpecialPatterns(text: string): string[] {
    for (const pattern of this.patterns) {
      const segments: string[] = [];
      let lastEnd = 0;

      for (const match of text.matchAll(pattern.matcher)) {
        const start = match.index ?? lastEnd;
        const between = text.slice(lastEnd, start);
        if (!isBlank(between)) {
          segments.push(between);
        }
        segments.push(match[0]);
        lastEnd = start + match[0].length;
      }

      if (segments.length === 0) continue;

      const remaining = text.slice(lastEnd);
      if (!isBlank(remaining)) {
        segments.push(remaining);
      }

      debug(`Split on ${pattern.name} pattern into ${segments.length} initial segments`);
      return segments;
    }

    return [];
  }

  private splitRecursive(text: string, fromIndex: number): string[] {
    const { separators, chunkSize } = this.config;
    const lastIndex = separators.length - 1;

    for (let i = fromIndex; i <= lastIndex; i++) {
      const separator = separators[i];
      if (separator === undefined) break;

      // The empty separator only counts as the last resort
      if (separator === '' && i !== lastIndex) continue;

      const fragments =
        separator === '' ? this.sliceByCharacters(text) : this.splitBySeparator(text, separator);
      if (fragments.length <= 1) continue;

      debug(`Split into ${fragments.length} segments on '${describeSeparator(separator)}'`);

      const result: string[] = [];
      for (const fragment of fragments) {
        if (i < lastIndex && estimateTokens(fragment) > chunkSize) {
          result.push(...this.splitRecursive(fragment, i + 1));
        } else {
          result.push(fragment);
        }
      }
      return result;
    }

    // Nothing left to split on: emit as-is, even when over budget
    return text ? [text] : [];
  }

  private splitBySeparator(text: string, separator: string): string[] {
    const parts = text.split(separator);
    const fragments: string[] = [];

    parts.forEach((part, i) => {
      const fragment = this.config.keepSeparator && i < parts.length - 1 ? part + separator : part;
      if (fragment) {
        fragments.push(fragment);
      }
    });

    return fragments;
  }

  private sliceByCharacters(text: string): string[] {
    const width = this.config.chunkSize * ESTIMATED_CHARS_PER_TOKEN;
    const slices: string[] = [];
    for (let i = 0; i < text.length; i += width) {
      slices.push(text.slice(i, i + width));
    }
    return slices;
  }

  private applyOverlap(chunks: string[]): OverlappedChunk[] {
    const overlapChars = this.config.chunkOverlap * ESTIMATED_CHARS_PER_TOKEN;

    return chunks.map((chunk, i) => {
      const previous = i > 0 ? chunks[i - 1] : undefined;
      if (!previous || overlapChars === 0) {
        return { content: chunk, overlapLength: 0 };
      }
      const overlap = previous.slice(previous.length - Math.min(overlapChars, previous.length));
      return { content: overlap + chunk, overlapLength: overlap.length };
    });
  }
}

/**
 * Builds the chunker for a preset. `auto` samples the text and picks the
 * markdown separators when it looks like markdown.
 */
export function createChunker(
  preset: ChunkPreset,
  options: Omit<ChunkingOptions, 'separators'> = {},
  sample: string = ''
): RecursiveChunker {
  switch (preset) {
    case 'markdown':
      return RecursiveChunker.forMarkdown(options);
    case 'code':
      return RecursiveChunker.forCode(options);
    case 'prose':
      return new RecursiveChunker(options);
    case 'auto':
      return looksLikeMarkdown(sample) ? RecursiveChunker.forMarkdown(options) : new RecursiveChunker(options);
  }
}

export function createChunkerForContent(
  text: string,
  options: Omit<ChunkingOptions, 'separators'> = {}
): RecursiveChunker {
  return createChunker('auto', options, text);
}
