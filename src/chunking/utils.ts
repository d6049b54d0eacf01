export function splitIntoWords(text: string): string[] {
  return text.split(/[ \n\r\t]+/).filter(Boolean);
}

export function isBlank(text: string | null | undefined): boolean {
  return !text || text.trim().length === 0;
}

// Renders separators readably in debug output ("\n\n" -> "\\n\\n")
export function describeSeparator(separator: string): string {
  if (separator === '') return '<char>';
  return separator.replace(/\n/g, '\\n').replace(/\t/g, '\\t');
}
