/**
 * Parsed form of an atom-type definition pattern.
 *
 * A pattern is a tree of nodes. Inside a chain `[A][B][C]` each node's `next`
 * is the following atom. The last atom of a chain owns the parenthesized
 * branches written after it and, as `next`, the unparenthesized tail pattern:
 * `[C]([H])([H])[O]` has one node for C with two branches and `next` = O.
 */
export interface PatternNode {
  atom: PatternAtom;
  branches: PatternNode[];
  next: PatternNode | null;
}

/**
 * One bracketed atom constraint, e.g. `[#6;D4]` or `[O]2`.
 */
export interface PatternAtom {
  expression: AtomExpression;
  label: number | null; // trailing integer after ']', kept but not used by matching
  position: number; // offset of the atom's first character in the pattern text
}

export type AtomExpression = LogicalExpression | AtomPrimitive;

export interface LogicalExpression {
  operator: 'and' | 'or';
  left: AtomExpression;
  right: AtomExpression;
}

export type AtomPrimitive =
  | { type: 'any' }
  | { type: 'atomic_number'; value: number }
  | { type: 'element'; symbol: string; value: number }
  | { type: 'has_label'; name: string }
  | { type: 'neighbor_count'; value: number }
  | { type: 'ring_size'; value: number }
  | { type: 'sub_pattern'; pattern: PatternNode };

export function isLogicalExpression(expression: AtomExpression): expression is LogicalExpression {
  return 'operator' in expression;
}

/**
 * Pattern positions reachable from a node other than the one the walk
 * arrived from: its branches, then its chain continuation.
 */
export function neighborContinuations(node: PatternNode): PatternNode[] {
  return node.next ? [...node.branches, node.next] : [...node.branches];
}
