export interface Chunk {
  content: string;
  index: number;
  tokenEstimate: number;
  overlapLength: number; // Leading characters repeated from the previous chunk
}

export interface SpecialPattern {
  name: string;
  matcher: RegExp; // Must carry the global flag
  priority: number;
}

export interface ChunkingOptions {
  chunkSize?: number; // Maximum estimated tokens per chunk
  chunkOverlap?: number; // Tokens of trailing context carried into the next chunk
  separators?: readonly string[];
  keepSeparator?: boolean;
  specialPatterns?: readonly SpecialPattern[];
}

export interface ChunkingStrategy {
  readonly name: string;
  splitText(text: string): string[];
  chunk(text: string): Chunk[];
}
