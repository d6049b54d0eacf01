// Large inputs are only sampled from the start
const SAMPLE_LENGTH = 5000;

const has = (text: string, ...needles: string[]): boolean => needles.every((n) => text.includes(n));

const MARKDOWN_SIGNALS: Array<(sample: string) => boolean> = [
  // Headers, including setext underlines and rules
  (s) => ['\n# ', '\n## ', '\n=====', '\n---'].some((n) => s.includes(n)),
  // List markers
  (s) => ['\n- ', '\n* ', '\n1. ', '\n+ '].some((n) => s.includes(n)),
  // Inline code, fences, indented code
  (s) => s.includes('`') || has(s, '    ', '\n    '),
  // Links, emphasis, block quotes
  (s) => has(s, '[', '](') || s.includes('**') || s.includes('__') || has(s, '>', '\n>'),
  // Tables
  (s) => has(s, '|', '\n|', '|--') || s.includes('--|'),
];

export function looksLikeMarkdown(text: string): boolean {
  if (!text) return false;
  const sample = text.length > SAMPLE_LENGTH ? text.slice(0, SAMPLE_LENGTH) : text;
  return MARKDOWN_SIGNALS.some((signal) => signal(sample));
}
