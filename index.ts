export { parseAtomTypePattern } from 'src/parsers/pattern-parser';
export { tokenizeAtomTypePattern } from 'src/parsers/pattern-tokenizer';
export type { PatternToken, PatternTokenType } from 'src/parsers/pattern-tokenizer';
export type {
  PatternNode,
  PatternAtom,
  AtomExpression,
  LogicalExpression,
  AtomPrimitive,
} from 'src/types/pattern-types';
export { neighborContinuations } from 'src/types/pattern-types';
export { matchesPattern, evaluateAtomExpression } from 'src/matchers/pattern-matcher';
export type { MatchContext } from 'src/matchers/pattern-matcher';
export { AtomTypeRule } from 'src/typing/atom-type-rule';
export { findAtomTypes, resolveAtomType } from 'src/typing/atom-typer';
export type { AtomTypeSets, FindAtomTypesOptions } from 'src/typing/atom-typer';
export { BondGraph, buildBondGraph } from 'src/utils/bond-graph';
export {
  generateBondedTerms,
  createForces,
  createAngles,
  createDihedrals,
  createImpropers,
} from 'src/generators/bonded-terms';
export type { BondedTermOptions, BondedTerms, CreateForcesOptions, RecordedTerms } from 'src/generators/bonded-terms';
export { AtomTypeRegistry } from 'src/forcefield/atom-type-registry';
export type { AtomTypeDefinition, RegisteredAtomType } from 'src/forcefield/atom-type-registry';
export {
  Forcefield,
  ForcefieldLoader,
  parseForcefieldXML,
  resolveForcefieldName,
} from 'src/forcefield/forcefield-loader';
export { applyForcefield } from 'src/forcefield/apply-forcefield';
export type {
  ApplyForcefieldOptions,
  ApplyForcefieldResult,
  AmbiguousAtomType,
} from 'src/forcefield/apply-forcefield';
export { PatternSyntaxError, UnsupportedFeatureError, ForcefieldNotFoundError } from 'src/errors';
export { ATOMIC_NUMBERS, FORCEFIELD_ALIASES } from 'src/constants';
export type {
  Atom,
  Bond,
  Structure,
  Angle,
  Dihedral,
  Improper,
  Pair,
  ParameterSet,
} from 'types';
