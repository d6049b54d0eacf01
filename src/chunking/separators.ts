import type { SpecialPattern } from './types';

// Strongest to weakest. The trailing "" means character-level slicing.
export const DEFAULT_SEPARATORS: readonly string[] = Object.freeze([
  '\n\n\n', // Major section break
  '\n\n', // Paragraph
  '\n', // Line
  '. ',
  '! ',
  '? ',
  ';',
  ',',
  ' ',
  '',
]);

export const MARKDOWN_SEPARATORS: readonly string[] = Object.freeze([
  '\n## ',
  '\n### ',
  '\n#### ',
  '\n##### ',
  '\n###### ',
  '\n\n',
  '\n',
  ' ',
  '',
]);

// Block and statement boundaries first
export const CODE_SEPARATORS: readonly string[] = Object.freeze([
  '\n\n\n',
  '\n\n',
  '\n',
  ';',
  '{',
  '}',
  ' ',
  '',
]);

export const FENCED_CODE_PATTERN: SpecialPattern = {
  name: 'fenced-code',
  matcher: /```[\s\S]*?```/g,
  priority: 20,
};

export const BULLET_LIST_PATTERN: SpecialPattern = {
  name: 'bullet-list',
  matcher: /^\s*[-*+]\s+.+$/gm,
  priority: 15,
};

export const NUMBERED_LIST_PATTERN: SpecialPattern = {
  name: 'numbered-list',
  matcher: /^\s*\d+\.\s+.+$/gm,
  priority: 15,
};

export const HEADER_PATTERN: SpecialPattern = {
  name: 'markdown-header',
  matcher: /^\s*(#{1,6})\s+.+$/gm,
  priority: 10,
};

export const DEFAULT_SPECIAL_PATTERNS: readonly SpecialPattern[] = Object.freeze([
  HEADER_PATTERN,
  FENCED_CODE_PATTERN,
  BULLET_LIST_PATTERN,
  NUMBERED_LIST_PATTERN,
]);

/**
 * Highest priority first. Array.prototype.sort is stable, so patterns with
 * equal priority keep their configured order.
 */
export function sortByPriority(patterns: readonly SpecialPattern[]): SpecialPattern[] {
  return [...patterns].sort((a, b) => b.priority - a.priority);
}
