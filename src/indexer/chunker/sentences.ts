/**
 * Sentence splitting
 *
 * A heuristic splitter, not a full sentence tokenizer: it breaks after
 * `.`, `!` or `?` followed by whitespace and an uppercase letter, unless the
 * word before the period looks like an abbreviation.
 */

const ABBREVIATIONS = new Set([
  'dr.',
  'mr.',
  'mrs.',
  'ms.',
  'prof.',
  'sr.',
  'jr.',
  'st.',
  'vs.',
  'etc.',
  'inc.',
  'ltd.',
  'co.',
  'no.',
  'fig.',
]);

const BOUNDARY = /[.!?]\s+(?=[A-Z])/g;

/**
 * Collapse every run of whitespace (newlines included) into one space.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * True when the word ending at a period should not end a sentence:
 * single letters ("J."), letter-dot runs ("U.S.", "e.g.") and known titles.
 */
export function isAbbreviation(word: string): boolean {
  const token = word.replace(/^["'(\[]+/, '');
  if (/^([A-Za-z]\.)+$/.test(token)) return true;
  return ABBREVIATIONS.has(token.toLowerCase());
}

/**
 * Split normalized text into sentences. Each sentence keeps its
 * terminal punctuation.
 */
export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  let start = 0;

  for (const match of text.matchAll(BOUNDARY)) {
    const end = (match.index ?? 0) + 1;
    if (text[end - 1] === '.') {
      const wordStart = text.lastIndexOf(' ', end - 1) + 1;
      if (isAbbreviation(text.slice(wordStart, end))) continue;
    }
    const sentence = text.slice(start, end).trim();
    if (sentence) sentences.push(sentence);
    start = (match.index ?? 0) + match[0].length;
  }

  const rest = text.slice(start).trim();
  if (rest) sentences.push(rest);
  return sentences;
}
