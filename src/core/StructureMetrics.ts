import { align, minCostPairs } from './alignment.js';
import type { PairCounts } from './MetricAggregator.js';
import { isSubtree, type Branch, type ConditionNode, type StructuredUnit } from './types.js';
import { findSpan, normalizeWhitespace, spanIou, type TextSpan } from '../utils/textSimilarity.js';

/**
 * Structure Metrics
 *
 * Provision-wide comparisons that need no alignment: tree edit similarity
 * over span-located trees (TES), IoU-matched span counts (SoftF1), and
 * exact-signature graphs for Edge-F1, NodeSpan-F1 and nTED.
 */

export interface SpanTreeNode {
  type: string;
  /** null when the text is not found in the source */
  span: TextSpan | null;
  children: SpanTreeNode[];
}

export interface SpanTree {
  root: SpanTreeNode;
  /** Nodes whose span was located */
  spanNodes: SpanTreeNode[];
}

export interface SignatureGraph {
  nodes: Set<string>;
  edges: Set<string>;
}

export interface StructureComparison {
  treeEditSimilarity: number;
  normalizedEditDistance: number;
  edges: PairCounts;
  spanNodes: PairCounts;
  softSpans: PairCounts;
}

/** Structural nodes always overlap each other fully */
const STRUCTURAL_SPAN: TextSpan = { start: 0, end: 1 };

export function buildSpanTree(units: readonly StructuredUnit[], source: string): SpanTree {
  const spanNodes: SpanTreeNode[] = [];

  const located = (type: string, text: string, occurrence?: number): SpanTreeNode => {
    const node: SpanTreeNode = { type, span: findSpan(source, text, occurrence), children: [] };
    if (node.span) {
      spanNodes.push(node);
    }
    return node;
  };
  const structural = (type: string, children: SpanTreeNode[]): SpanTreeNode => ({
    type,
    span: STRUCTURAL_SPAN,
    children,
  });

  const conditionNode = (node: ConditionNode): SpanTreeNode =>
    isSubtree(node) ? structural(`OP:${node.op}`, node.items.map(conditionNode)) : located(node.tag, node.text);

  const branchNode = (branch: Branch): SpanTreeNode => {
    const anchor = located('ANCH', branch.anchor.text, branch.anchor.occurrence);
    anchor.children.push(structural(`MODAL:${branch.norm_kind}`, [conditionNode(branch.conditions)]));
    for (const effect of branch.effects) {
      anchor.children.push(located('EFFECT', effect.effect_text));
    }
    return anchor;
  };

  const root = structural(
    'ROOT',
    units.map((unit) => structural('UNIT', unit.branches.map(branchNode)))
  );
  return { root, spanNodes };
}

/**
 * 1 - TED / (|predicted| + |gold|). Renaming costs 1 across types and
 * 1 - IoU within a type; children pair up by min-cost assignment and the
 * rest are inserted or deleted whole.
 */
export function treeEditSimilarity(predicted: SpanTreeNode, gold: SpanTreeNode): number {
  const sizes = new Map<SpanTreeNode, number>();
  const size = (node: SpanTreeNode): number => {
    const cached = sizes.get(node);
    if (cached !== undefined) {
      return cached;
    }
    const total = node.children.reduce((sum, child) => sum + size(child), 1);
    sizes.set(node, total);
    return total;
  };

  const memo = new Map<SpanTreeNode, Map<SpanTreeNode, number>>();
  const distance = (a: SpanTreeNode, b: SpanTreeNode): number => {
    let row = memo.get(a);
    if (!row) {
      row = new Map();
      memo.set(a, row);
    }
    const cached = row.get(b);
    if (cached !== undefined) {
      return cached;
    }

    let total = a.type === b.type ? 1 - spanIou(a.span, b.span) : 1;
    const cost = a.children.map((x) => b.children.map((y) => distance(x, y)));
    const pairs = minCostPairs(cost, a.children.length, b.children.length);
    const deleted = new Set(a.children.keys());
    const inserted = new Set(b.children.keys());
    for (const { row: i, col: j } of pairs) {
      total += cost[i][j];
      deleted.delete(i);
      inserted.delete(j);
    }
    for (const i of deleted) {
      total += size(a.children[i]);
    }
    for (const j of inserted) {
      total += size(b.children[j]);
    }

    row.set(b, total);
    return total;
  };

  const maxDistance = size(predicted) + size(gold);
  return Math.max(0, 1 - distance(predicted, gold) / maxDistance);
}

/**
 * Same-type located spans paired by maximum total IoU; pairs at or above
 * `iouThreshold` are matched.
 */
export function softSpanCounts(
  predicted: readonly SpanTreeNode[],
  gold: readonly SpanTreeNode[],
  iouThreshold: number
): PairCounts {
  const weights = predicted.map((p) => gold.map((g) => (p.type === g.type ? spanIou(p.span, g.span) : 0)));
  const alignment = align(weights, predicted.length, gold.length, { strategy: 'exact' });
  return {
    predicted: predicted.length,
    gold: gold.length,
    matched: alignment.pairs.filter((pair) => pair.score >= iouThreshold).length,
  };
}

function leafSignature(tag: string, text: string): string {
  return `LEAF|${normalizeWhitespace(tag)}|${normalizeWhitespace(text)}`;
}

function opSignature(node: ConditionNode): string {
  if (!isSubtree(node)) {
    return leafSignature(node.tag, node.text);
  }
  const children = node.items.map(opSignature).sort();
  return `OP|${node.op}|${JSON.stringify(children)}`;
}

function edgeKey(label: string, from: string, to: string): string {
  return JSON.stringify([label, from, to]);
}

/**
 * Union of every branch's anchor, modality, condition and effect
 * signatures. Identical subtrees share one signature.
 */
export function buildSignatureGraph(units: readonly StructuredUnit[]): SignatureGraph {
  const nodes = new Set<string>();
  const edges = new Set<string>();

  const addConditions = (node: ConditionNode): string => {
    const signature = opSignature(node);
    nodes.add(signature);
    if (isSubtree(node)) {
      for (const item of node.items) {
        edges.add(edgeKey('COND_CHILD', signature, addConditions(item)));
      }
    }
    return signature;
  };

  for (const unit of units) {
    for (const branch of unit.branches) {
      const anchor = `ANCH|${normalizeWhitespace(branch.anchor.text)}|${branch.anchor.occurrence}`;
      const modal = `MODAL|${branch.norm_kind}`;
      nodes.add(anchor);
      nodes.add(modal);
      edges.add(edgeKey('MOD', anchor, modal));
      edges.add(edgeKey('COND_ROOT', modal, addConditions(branch.conditions)));

      for (const effect of branch.effects) {
        const signature = `EFFECT|${normalizeWhitespace(effect.effect_text)}`;
        nodes.add(signature);
        edges.add(edgeKey('ANCH_EFFECT', anchor, signature));
      }
    }
  }

  return { nodes, edges };
}

function overlap(predicted: ReadonlySet<string>, gold: ReadonlySet<string>): PairCounts {
  let matched = 0;
  for (const item of predicted) {
    if (gold.has(item)) {
      matched++;
    }
  }
  return { predicted: predicted.size, gold: gold.size, matched };
}

function spanSignatures(nodes: ReadonlySet<string>): Set<string> {
  return new Set([...nodes].filter((n) => n.startsWith('LEAF|') || n.startsWith('EFFECT|')));
}

/**
 * Symmetric difference of nodes and edges over the combined size of both
 * graphs
 */
export function normalizedEditDistance(predicted: SignatureGraph, gold: SignatureGraph): number {
  const nodes = overlap(predicted.nodes, gold.nodes);
  const edges = overlap(predicted.edges, gold.edges);
  const edits = nodes.predicted + nodes.gold - 2 * nodes.matched + (edges.predicted + edges.gold - 2 * edges.matched);
  return edits / Math.max(1, nodes.predicted + nodes.gold + edges.predicted + edges.gold);
}

export function compareStructure(
  predicted: readonly StructuredUnit[],
  gold: readonly StructuredUnit[],
  source: string,
  iouThreshold: number
): StructureComparison {
  const predictedTree = buildSpanTree(predicted, source);
  const goldTree = buildSpanTree(gold, source);
  const predictedGraph = buildSignatureGraph(predicted);
  const goldGraph = buildSignatureGraph(gold);

  return {
    treeEditSimilarity: treeEditSimilarity(predictedTree.root, goldTree.root),
    normalizedEditDistance: normalizedEditDistance(predictedGraph, goldGraph),
    edges: overlap(predictedGraph.edges, goldGraph.edges),
    spanNodes: overlap(spanSignatures(predictedGraph.nodes), spanSignatures(goldGraph.nodes)),
    softSpans: softSpanCounts(predictedTree.spanNodes, goldTree.spanNodes, iouThreshold),
  };
}
