// Core types for molecular structures handed to the atom typer

/**
 * Atom in a structure.
 * The structure owns its atoms; typing only writes the output fields
 * (whitelist, blacklist, atomType).
 */
export interface Atom {
  id: number; // stable index, unique within the structure
  atomicNumber: number;
  symbol?: string; // e.g. 'C', 'Cl'
  name?: string; // e.g. 'C1', 'H12'
  whitelist?: Set<string>; // rule names matched (written by findAtomTypes)
  blacklist?: Set<string>; // rule names revoked by an overriding match
  atomType?: string; // resolved type name (written by applyForcefield)
}

/**
 * Covalent bond between two atoms, by atom id.
 */
export interface Bond {
  atom1: number;
  atom2: number;
}

/** Angle a-b-c; atom2 is the vertex. */
export interface Angle {
  atom1: number;
  atom2: number;
  atom3: number;
}

/** Proper torsion a-b-c-d around the b-c bond. */
export interface Dihedral {
  atom1: number;
  atom2: number;
  atom3: number;
  atom4: number;
}

/** Improper torsion; atom1 is the central atom. */
export interface Improper {
  atom1: number;
  atom2: number;
  atom3: number;
  atom4: number;
}

/** 1-4 nonbonded exception pair. */
export interface Pair {
  atom1: number;
  atom2: number;
}

/**
 * Structure representation.
 * Term lists are created on first append by createForces.
 */
export interface Structure {
  atoms: Atom[];
  bonds: Bond[];
  angles?: Angle[];
  dihedrals?: Dihedral[];
  rbTorsions?: Dihedral[];
  impropers?: Improper[];
  adjusts?: Pair[];
}

/**
 * What the term generator needs to know about the active parameter set:
 * which torsion tables it populates.
 */
export interface ParameterSet {
  readonly hasDihedralTypes: boolean;
  readonly hasRbTorsionTypes: boolean;
}
