import type { Angle, Dihedral, Improper, Pair, ParameterSet, Structure } from 'types';
import type { BondGraph } from 'src/utils/bond-graph';
import { buildBondGraph } from 'src/utils/bond-graph';
import { pairCombinations, tripleCombinations } from 'src/utils/combinatorics';

export interface BondedTermOptions {
  angles?: boolean; // default true
  dihedrals?: boolean; // default true
  impropers?: boolean; // default false
  pairs?: boolean; // 1-4 pairs, one per dihedral; default true
}

export interface BondedTerms {
  angles: Angle[];
  dihedrals: Dihedral[];
  impropers: Improper[];
  pairs: Pair[];
}

/**
 * Derive every angle, dihedral, improper and 1-4 pair implied by the bond graph.
 * Nodes are visited in graph order; each bond is considered for dihedrals
 * once, from its lower id end.
 */
export function generateBondedTerms(graph: BondGraph, options: BondedTermOptions = {}): BondedTerms {
  const { angles = true, dihedrals = true, impropers = false, pairs = true } = options;
  const terms: BondedTerms = { angles: [], dihedrals: [], impropers: [], pairs: [] };

  if (!angles && !dihedrals && !impropers) {
    return terms;
  }

  for (const node1 of graph.getNodes()) {
    const neighbors1 = graph.getNeighbors(node1);
    if (neighbors1.length < 2) continue;

    if (angles) {
      appendAll(terms.angles, createAngles(node1, neighbors1));
    }

    if (dihedrals) {
      for (const node2 of neighbors1) {
        if (node2 <= node1) continue;
        const neighbors2 = graph.getNeighbors(node2);
        if (neighbors2.length < 2) continue;

        const torsions = createDihedrals(node1, neighbors1, node2, neighbors2);
        appendAll(terms.dihedrals, torsions);
        if (pairs) {
          appendAll(
            terms.pairs,
            torsions.map(torsion => ({ atom1: torsion.atom1, atom2: torsion.atom4 })),
          );
        }
      }
    }

    if (impropers && neighbors1.length >= 3) {
      appendAll(terms.impropers, createImpropers(node1, neighbors1));
    }
  }

  return terms;
}

export function createAngles(node: number, neighbors: readonly number[]): Angle[] {
  return pairCombinations(neighbors).map(([a, b]) => ({ atom1: a, atom2: node, atom3: b }));
}

/**
 * Dihedrals around the bond node1-node2. A pair of outer atoms that is the
 * same atom (three-membered ring) yields no dihedral.
 */
export function createDihedrals(
  node1: number,
  neighbors1: readonly number[],
  node2: number,
  neighbors2: readonly number[],
): Dihedral[] {
  const outer1 = neighbors1.filter(id => id !== node2);
  const outer2 = neighbors2.filter(id => id !== node1);
  const result: Dihedral[] = [];

  for (const a of outer1) {
    for (const b of outer2) {
      if (a !== b) {
        result.push({ atom1: a, atom2: node1, atom3: node2, atom4: b });
      }
    }
  }

  return result;
}

export function createImpropers(node: number, neighbors: readonly number[]): Improper[] {
  return tripleCombinations(neighbors).map(([a, b, c]) => ({ atom1: node, atom2: a, atom3: b, atom4: c }));
}

export interface CreateForcesOptions extends BondedTermOptions {
  graph?: BondGraph;
  /**
   * What to do with a dihedral when the parameter set declares neither
   * periodic nor Ryckaert-Bellemans torsion types: drop it (default) or keep
   * it as a proper dihedral.
   */
  uncoveredTorsions?: 'omit' | 'dihedral';
}

export interface RecordedTerms {
  angles: Angle[];
  dihedrals: Dihedral[];
  rbTorsions: Dihedral[];
  impropers: Improper[];
  adjusts: Pair[];
}

/**
 * Generate the bonded terms of a structure and append them to its term lists.
 * Each dihedral is recorded under every torsion class the parameter set
 * populates; 1-4 pairs go to `adjusts` whatever the torsion class.
 * Returns what was appended.
 */
export function createForces(
  structure: Structure,
  parameterSet: ParameterSet,
  options: CreateForcesOptions = {},
): RecordedTerms {
  const graph = options.graph ?? buildBondGraph(structure);
  const terms = generateBondedTerms(graph, options);

  const keepUncovered =
    options.uncoveredTorsions === 'dihedral' && !parameterSet.hasDihedralTypes && !parameterSet.hasRbTorsionTypes;

  const recorded: RecordedTerms = {
    angles: terms.angles,
    dihedrals: parameterSet.hasDihedralTypes || keepUncovered ? terms.dihedrals : [],
    rbTorsions: parameterSet.hasRbTorsionTypes ? terms.dihedrals.map(dihedral => ({ ...dihedral })) : [],
    impropers: terms.impropers,
    adjusts: terms.pairs,
  };

  structure.angles = appendAll(structure.angles ?? [], recorded.angles);
  structure.dihedrals = appendAll(structure.dihedrals ?? [], recorded.dihedrals);
  structure.rbTorsions = appendAll(structure.rbTorsions ?? [], recorded.rbTorsions);
  structure.impropers = appendAll(structure.impropers ?? [], recorded.impropers);
  structure.adjusts = appendAll(structure.adjusts ?? [], recorded.adjusts);

  return recorded;
}

function appendAll<T>(target: T[], items: readonly T[]): T[] {
  for (const item of items) {
    target.push(item);
  }
  return target;
}
