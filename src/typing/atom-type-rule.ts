import type { PatternNode } from 'src/types/pattern-types';
import type { MatchContext } from 'src/matchers/pattern-matcher';
import { matchesPattern } from 'src/matchers/pattern-matcher';
import { parseAtomTypePattern } from 'src/parsers/pattern-parser';

/**
 * A named atom type definition: the pattern an atom must match and the
 * rule names whose claim on the atom is revoked when this rule matches it.
 */
export class AtomTypeRule {
  readonly ast: PatternNode;
  readonly overrides: ReadonlySet<string>;

  constructor(
    readonly name: string,
    readonly pattern: string,
    overrides?: Iterable<string>,
  ) {
    this.ast = parseAtomTypePattern(pattern);
    this.overrides = new Set(overrides ?? []);
  }

  matches(atomId: number, context: MatchContext): boolean {
    return matchesPattern(this.ast, atomId, context);
  }

  toString(): string {
    return `Rule(${this.name}, ${this.pattern}, {${[...this.overrides].join(', ')}})`;
  }
}
