/**
 * Bipartite alignment primitive
 *
 * Shared by the unit aligner (greedy), the branch aligner, condition-tree
 * children at every depth and effect lists (exact). Rows are predicted
 * elements, columns gold elements.
 */

export type AlignStrategy = 'exact' | 'greedy';

export interface AlignOptions {
  strategy: AlignStrategy;
  /** Pairs scoring below this never match. Zero-score pairs never match either. */
  minScore?: number;
}

export interface AlignedPair {
  predicted: number;
  gold: number;
  score: number;
}

export interface Alignment {
  /** Sorted by gold index */
  pairs: AlignedPair[];
  unmatchedPredicted: number[];
  unmatchedGold: number[];
}

export function align(
  weights: readonly (readonly number[])[],
  predictedCount: number,
  goldCount: number,
  options: AlignOptions
): Alignment {
  const minScore = options.minScore ?? 0;
  const eligible = (score: number) => score > 0 && score >= minScore;

  let pairs: AlignedPair[] = [];
  if (predictedCount > 0 && goldCount > 0) {
    pairs =
      options.strategy === 'greedy'
        ? greedyPairs(weights, predictedCount, goldCount, eligible)
        : exactPairs(weights, predictedCount, goldCount, eligible);
  }

  pairs.sort((a, b) => a.gold - b.gold);
  const usedPredicted = new Set(pairs.map((p) => p.predicted));
  const usedGold = new Set(pairs.map((p) => p.gold));

  return {
    pairs,
    unmatchedPredicted: range(predictedCount).filter((i) => !usedPredicted.has(i)),
    unmatchedGold: range(goldCount).filter((j) => !usedGold.has(j)),
  };
}

function range(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i);
}

/**
 * Repeatedly take the best remaining pair. Ties go to the lower gold
 * index, then the lower predicted index.
 */
function greedyPairs(
  weights: readonly (readonly number[])[],
  predictedCount: number,
  goldCount: number,
  eligible: (score: number) => boolean
): AlignedPair[] {
  const candidates: AlignedPair[] = [];
  for (let p = 0; p < predictedCount; p++) {
    for (let g = 0; g < goldCount; g++) {
      const score = weights[p][g];
      if (eligible(score)) {
        candidates.push({ predicted: p, gold: g, score });
      }
    }
  }
  candidates.sort((a, b) => b.score - a.score || a.gold - b.gold || a.predicted - b.predicted);

  const usedPredicted = new Set<number>();
  const usedGold = new Set<number>();
  const pairs: AlignedPair[] = [];
  for (const candidate of candidates) {
    if (usedPredicted.has(candidate.predicted) || usedGold.has(candidate.gold)) {
      continue;
    }
    usedPredicted.add(candidate.predicted);
    usedGold.add(candidate.gold);
    pairs.push(candidate);
  }
  return pairs;
}

/**
 * Maximum-weight assignment. Ineligible pairs get weight 0, so dropping
 * them afterwards leaves an optimal matching over the eligible pairs.
 */
function exactPairs(
  weights: readonly (readonly number[])[],
  predictedCount: number,
  goldCount: number,
  eligible: (score: number) => boolean
): AlignedPair[] {
  const effective = range(predictedCount).map((p) =>
    range(goldCount).map((g) => (eligible(weights[p][g]) ? weights[p][g] : 0))
  );

  let maxWeight = 0;
  for (const row of effective) {
    for (const w of row) {
      maxWeight = Math.max(maxWeight, w);
    }
  }

  const transposed = predictedCount > goldCount;
  const cost = transposed
    ? range(goldCount).map((g) => range(predictedCount).map((p) => maxWeight - effective[p][g]))
    : effective.map((row) => row.map((w) => maxWeight - w));

  const rowToCol = hungarian(cost);
  const pairs: AlignedPair[] = [];
  rowToCol.forEach((col, row) => {
    if (col < 0) return;
    const predicted = transposed ? col : row;
    const gold = transposed ? row : col;
    if (eligible(weights[predicted][gold])) {
      pairs.push({ predicted, gold, score: weights[predicted][gold] });
    }
  });
  return pairs;
}

/**
 * Min-cost assignment of min(rows, cols) pairs for a matrix of any shape
 */
export function minCostPairs(
  cost: readonly (readonly number[])[],
  rows: number,
  cols: number
): { row: number; col: number }[] {
  if (rows === 0 || cols === 0) {
    return [];
  }
  if (rows <= cols) {
    return hungarian(cost).flatMap((col, row) => (col < 0 ? [] : [{ row, col }]));
  }
  const transposed = range(cols).map((c) => range(rows).map((r) => cost[r][c]));
  return hungarian(transposed).flatMap((row, col) => (row < 0 ? [] : [{ row, col }]));
}

/**
 * Min-cost assignment for an n x m matrix with n <= m (Hungarian method
 * with potentials). Returns the column assigned to each row.
 */
export function hungarian(cost: readonly (readonly number[])[]): number[] {
  const n = cost.length;
  if (n === 0) {
    return [];
  }
  const m = cost[0].length;
  if (m < n) {
    throw new Error(`hungarian() expects rows <= columns, got ${n}x${m}`);
  }

  const u = new Array<number>(n + 1).fill(0);
  const v = new Array<number>(m + 1).fill(0);
  const p = new Array<number>(m + 1).fill(0);
  const way = new Array<number>(m + 1).fill(0);

  for (let i = 1; i <= n; i++) {
    p[0] = i;
    let j0 = 0;
    const minv = new Array<number>(m + 1).fill(Infinity);
    const used = new Array<boolean>(m + 1).fill(false);

    do {
      used[j0] = true;
      const i0 = p[j0];
      let delta = Infinity;
      let j1 = 0;
      for (let j = 1; j <= m; j++) {
        if (used[j]) continue;
        const cur = cost[i0 - 1][j - 1] - u[i0] - v[j];
        if (cur < minv[j]) {
          minv[j] = cur;
          way[j] = j0;
        }
        if (minv[j] < delta) {
          delta = minv[j];
          j1 = j;
        }
      }
      for (let j = 0; j <= m; j++) {
        if (used[j]) {
          u[p[j]] += delta;
          v[j] -= delta;
        } else {
          minv[j] -= delta;
        }
      }
      j0 = j1;
    } while (p[j0] !== 0);

    do {
      const j1 = way[j0];
      p[j0] = p[j1];
      j0 = j1;
    } while (j0 !== 0);
  }

  const rowToCol = new Array<number>(n).fill(-1);
  for (let j = 1; j <= m; j++) {
    if (p[j] !== 0) {
      rowToCol[p[j] - 1] = j - 1;
    }
  }
  return rowToCol;
}
