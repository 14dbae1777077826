/**
 * Text similarity helpers
 *
 * All comparisons work on Unicode code points so CJK text is measured per
 * character, and on whitespace-normalized input.
 */

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Jaccard index of two sets; two empty sets are identical
 */
export function jaccard<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): number {
  if (a.size === 0 && b.size === 0) {
    return 1;
  }
  let intersection = 0;
  for (const item of a) {
    if (b.has(item)) {
      intersection++;
    }
  }
  return intersection / (a.size + b.size - intersection);
}

/**
 * Character n-grams of the normalized text. Texts shorter than `n`
 * contribute themselves as a single gram.
 */
export function charNgrams(text: string, n = 2): Set<string> {
  const chars = Array.from(normalizeWhitespace(text));
  const grams = new Set<string>();
  if (chars.length === 0) {
    return grams;
  }
  if (chars.length < n) {
    grams.add(chars.join(''));
    return grams;
  }
  for (let i = 0; i + n <= chars.length; i++) {
    grams.add(chars.slice(i, i + n).join(''));
  }
  return grams;
}

/**
 * Character n-gram Jaccard overlap, tolerant of small boundary drift
 */
export function ngramJaccard(a: string, b: string, n = 2): number {
  return jaccard(charNgrams(a, n), charNgrams(b, n));
}

export function levenshtein(a: string, b: string): number {
  const s = Array.from(a);
  const t = Array.from(b);
  if (s.length === 0) return t.length;
  if (t.length === 0) return s.length;

  let previous = Array.from({ length: t.length + 1 }, (_, j) => j);
  for (let i = 1; i <= s.length; i++) {
    const current = [i];
    for (let j = 1; j <= t.length; j++) {
      const substitution = previous[j - 1] + (s[i - 1] === t[j - 1] ? 0 : 1);
      current.push(Math.min(previous[j] + 1, current[j - 1] + 1, substitution));
    }
    previous = current;
  }
  return previous[t.length];
}

/**
 * 1 - normalized edit distance
 */
export function editSimilarity(a: string, b: string): number {
  const x = normalizeWhitespace(a);
  const y = normalizeWhitespace(b);
  const longest = Math.max(Array.from(x).length, Array.from(y).length);
  if (longest === 0) {
    return 1;
  }
  return 1 - levenshtein(x, y) / longest;
}

/**
 * Length ratio when one text contains the other, else 0
 */
export function containmentRatio(a: string, b: string): number {
  const x = normalizeWhitespace(a);
  const y = normalizeWhitespace(b);
  if (!x || !y) {
    return 0;
  }
  const [shorter, longer] = x.length <= y.length ? [x, y] : [y, x];
  if (!longer.includes(shorter)) {
    return 0;
  }
  return Array.from(shorter).length / Array.from(longer).length;
}

export function textSimilarity(a: string, b: string): number {
  return Math.max(editSimilarity(a, b), containmentRatio(a, b));
}

/**
 * Whitespace-insensitive substring test
 */
export function containsSpan(haystack: string, needle: string): boolean {
  const span = normalizeWhitespace(needle);
  if (!span) {
    return false;
  }
  return normalizeWhitespace(haystack).includes(span);
}

/** Half-open [start, end) offsets into whitespace-normalized text */
export interface TextSpan {
  start: number;
  end: number;
}

/**
 * Locate `needle` in whitespace-normalized `haystack`. Takes the
 * `occurrence`-th match (1-based) and falls back to the first match when
 * there are fewer.
 */
export function findSpan(haystack: string, needle: string, occurrence = 1): TextSpan | null {
  const span = normalizeWhitespace(needle);
  if (!span) {
    return null;
  }
  const text = normalizeWhitespace(haystack);

  let start = -1;
  for (let seen = 0; seen < Math.max(1, occurrence); seen++) {
    start = text.indexOf(span, start + 1);
    if (start < 0) {
      break;
    }
  }
  if (start < 0) {
    start = text.indexOf(span);
  }
  return start < 0 ? null : { start, end: start + span.length };
}

/**
 * Intersection over union of two spans; 0 when either is missing
 */
export function spanIou(a: TextSpan | null, b: TextSpan | null): number {
  if (!a || !b) {
    return 0;
  }
  const intersection = Math.min(a.end, b.end) - Math.max(a.start, b.start);
  if (intersection <= 0) {
    return 0;
  }
  const union = a.end - a.start + (b.end - b.start) - intersection;
  return union > 0 ? intersection / union : 0;
}
