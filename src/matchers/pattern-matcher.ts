import { zip } from 'es-toolkit';
import type { AtomExpression, AtomPrimitive, PatternNode } from 'src/types/pattern-types';
import { isLogicalExpression, neighborContinuations } from 'src/types/pattern-types';
import type { BondGraph } from 'src/utils/bond-graph';
import { permutations } from 'src/utils/combinatorics';
import { UnsupportedFeatureError } from 'src/errors';

/**
 * What a match can observe: the bond graph and the rule names already
 * granted to each atom.
 */
export interface MatchContext {
  graph: BondGraph;
  labelsOf(atomId: number): ReadonlySet<string>;
}

/**
 * Check whether `node` matches the atom `atomId`, walking the pattern and the
 * bond graph together.
 *
 * Pattern neighbors are unordered, so every injective assignment of the
 * atom's bonded neighbors to the node's continuations is tried and the first
 * one where all pairs match wins. The walk may map a continuation back onto
 * the atom it came from; only the pattern tree says which direction is new.
 */
export function matchesPattern(node: PatternNode, atomId: number, context: MatchContext): boolean {
  if (!evaluateAtomExpression(node.atom.expression, atomId, context)) {
    return false;
  }

  const continuations = neighborContinuations(node);
  if (continuations.length === 0) {
    return true;
  }

  const neighbors = context.graph.getNeighbors(atomId);
  if (neighbors.length < continuations.length) {
    return false;
  }

  for (const assignment of permutations(neighbors, continuations.length)) {
    const allMatch = zip(assignment, continuations).every(([neighbor, continuation]) =>
      matchesPattern(continuation, neighbor, context),
    );
    if (allMatch) {
      return true;
    }
  }

  return false;
}

export function evaluateAtomExpression(expression: AtomExpression, atomId: number, context: MatchContext): boolean {
  if (!isLogicalExpression(expression)) {
    return matchesAtomPrimitive(expression, atomId, context);
  }
  if (expression.operator === 'and') {
    return (
      evaluateAtomExpression(expression.left, atomId, context) &&
      evaluateAtomExpression(expression.right, atomId, context)
    );
  }
  return (
    evaluateAtomExpression(expression.left, atomId, context) ||
    evaluateAtomExpression(expression.right, atomId, context)
  );
}

function matchesAtomPrimitive(primitive: AtomPrimitive, atomId: number, context: MatchContext): boolean {
  switch (primitive.type) {
    case 'any':
      return true;

    case 'atomic_number':
    case 'element':
      return context.graph.getAtom(atomId)?.atomicNumber === primitive.value;

    case 'has_label':
      return context.labelsOf(atomId).has(primitive.name);

    case 'neighbor_count':
      return context.graph.getDegree(atomId) === primitive.value;

    case 'ring_size':
    case 'sub_pattern':
      throw new UnsupportedFeatureError(primitive.type);
  }
}
