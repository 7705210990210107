import type { Structure } from 'types';
import type { Forcefield } from 'src/forcefield/forcefield-loader';
import { ForcefieldLoader } from 'src/forcefield/forcefield-loader';
import type { AtomTypeSets } from 'src/typing/atom-typer';
import { findAtomTypes, resolveAtomType } from 'src/typing/atom-typer';
import type { CreateForcesOptions, RecordedTerms } from 'src/generators/bonded-terms';
import { createForces } from 'src/generators/bonded-terms';
import { buildBondGraph } from 'src/utils/bond-graph';

export interface ApplyForcefieldOptions extends Omit<CreateForcesOptions, 'graph'> {
  loader?: ForcefieldLoader; // used when the force field is given by name or path
  debug?: boolean;
  /**
   * Receives the typed structure with its bonded terms and fills in the
   * numeric parameters.
   */
  parametrize?: (structure: Structure, forcefield: Forcefield) => void;
}

export interface AmbiguousAtomType {
  atomId: number;
  candidates: string[];
}

export interface ApplyForcefieldResult {
  structure: Structure;
  forcefield: Forcefield;
  typing: Map<number, AtomTypeSets>;
  untyped: number[];
  ambiguous: AmbiguousAtomType[];
  terms: RecordedTerms;
}

/**
 * Type every atom of a structure with a force field's rules, generate its
 * bonded terms and hand it to the parametrizer.
 *
 * An atom left with exactly one rule after overrides gets that rule as its
 * `atomType`. Atoms with none are reported as untyped, atoms with several as
 * ambiguous; neither is an error here.
 */
export function applyForcefield(
  structure: Structure,
  forcefield: string | Forcefield,
  options: ApplyForcefieldOptions = {},
): ApplyForcefieldResult {
  const { loader, debug, parametrize, ...forceOptions } = options;

  if (structure.bonds.length === 0) {
    console.warn(`Structure contains no bonds: ${structure.atoms.length} atom(s)`);
  }

  const ff = typeof forcefield === 'string' ? (loader ?? new ForcefieldLoader()).load(forcefield) : forcefield;
  const graph = buildBondGraph(structure);
  const typing = findAtomTypes(structure, ff.rules(), { graph, debug });

  const untyped: number[] = [];
  const ambiguous: AmbiguousAtomType[] = [];
  for (const atom of structure.atoms) {
    const sets = typing.get(atom.id);
    const candidates = sets ? resolveAtomType(sets) : [];
    const [only] = candidates;
    atom.atomType = candidates.length === 1 ? only : undefined;

    if (candidates.length === 0) {
      untyped.push(atom.id);
    } else if (candidates.length > 1) {
      ambiguous.push({ atomId: atom.id, candidates });
    }
  }

  if (debug ?? process.env.VERBOSE) {
    console.log(`[FORCEFIELD] ${ff.name}: ${untyped.length} untyped, ${ambiguous.length} ambiguous atom(s)`);
  }

  const terms = createForces(structure, ff, { ...forceOptions, graph });
  parametrize?.(structure, ff);

  return { structure, forcefield: ff, typing, untyped, ambiguous, terms };
}
