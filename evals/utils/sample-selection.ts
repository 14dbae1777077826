import crypto from 'crypto';

/**
 * Rule id as used for joining gold and predictions: surrounding
 * whitespace and trailing `|` separators removed.
 */
export function normalizeRuleId(ruleId: string): string {
  return ruleId.trim().replace(/\|+$/, '').trim();
}

/** Round to nearest, ties to even */
function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff === 0.5) {
    return floor % 2 === 0 ? floor : floor + 1;
  }
  return diff < 0.5 ? floor : floor + 1;
}

/**
 * Deterministic subset: items ranked by sha256(`${seed}|${id}`), first
 * n * frac (ties to even) kept, in rank order. The same seed always
 * selects the same items.
 */
export function selectFraction<T>(items: readonly T[], frac: number, seed: string, idOf: (item: T) => string): T[] {
  if (frac >= 1) {
    return [...items];
  }
  const count = roundHalfEven(items.length * frac);
  if (frac <= 0 || count <= 0) {
    return [];
  }

  const rank = (item: T) => crypto.createHash('sha256').update(`${seed}|${idOf(item)}`, 'utf8').digest('hex');
  return items
    .map((item) => ({ item, key: rank(item) }))
    .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
    .slice(0, count)
    .map(({ item }) => item);
}
