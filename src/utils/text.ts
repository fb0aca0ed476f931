/**
 * Text normalization and tokenization shared by the knowledge graph and the
 * entity linker.
 */
import stopwordList from './stopwords.json';

const STOP_WORDS: ReadonlySet<string> = new Set(stopwordList);

// Letters/digits, allowing inner apostrophes and hyphens ("cell's", "x-ray")
const TOKEN_PATTERN = /[\p{L}\p{N}]+(?:['’-][\p{L}\p{N}]+)*/gu;

export interface Token {
  /** Lower-cased token text */
  text: string;
  /** Offset of the first character in the source text */
  offset: number;
}

/**
 * Case folding and whitespace normalization
 */
export function normalizeText(text: string): string {
  return text.toLowerCase().trim().replace(/\s+/g, ' ');
}

export function isStopWord(word: string): boolean {
  return STOP_WORDS.has(word.toLowerCase());
}

export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    tokens.push({ text: match[0].toLowerCase(), offset: match.index ?? 0 });
  }
  return tokens;
}

/**
 * Tokens left after stop-word removal, in source order
 */
export function contentTokens(text: string): Token[] {
  return tokenize(text).filter(token => !STOP_WORDS.has(token.text));
}

/**
 * Find `needle` inside `haystack` where both ends fall on word boundaries.
 * @returns The offset of the first such occurrence, or -1
 */
export function indexOfWord(haystack: string, needle: string): number {
  if (!needle) return -1;

  let from = 0;
  while (from <= haystack.length - needle.length) {
    const idx = haystack.indexOf(needle, from);
    if (idx === -1) return -1;

    const before = idx === 0 ? '' : haystack[idx - 1];
    const after = haystack[idx + needle.length] ?? '';
    if (!isWordChar(before) && !isWordChar(after)) {
      return idx;
    }
    from = idx + 1;
  }
  return -1;
}

function isWordChar(ch: string): boolean {
  return ch !== '' && /[\p{L}\p{N}]/u.test(ch);
}
