import { difference } from 'es-toolkit';
import type { Structure } from 'types';
import type { AtomTypeRule } from 'src/typing/atom-type-rule';
import type { MatchContext } from 'src/matchers/pattern-matcher';
import type { BondGraph } from 'src/utils/bond-graph';
import { buildBondGraph } from 'src/utils/bond-graph';

export interface AtomTypeSets {
  whitelist: Set<string>;
  blacklist: Set<string>;
}

export interface FindAtomTypesOptions {
  graph?: BondGraph; // reuse a graph already built for the structure
  debug?: boolean; // defaults to the VERBOSE environment variable
}

const NO_LABELS: ReadonlySet<string> = new Set();

/**
 * Apply every rule to every atom until nothing changes.
 *
 * Each pass only observes decisions committed by earlier passes: matches found
 * during a pass are buffered and committed in rule order when the pass ends,
 * skipping any match whose rule an earlier commit of the same pass revoked. A
 * rule is only tried on an atom that has neither accepted nor revoked it. A match
 * adds the rule to the atom's whitelist and the rule's overrides to its
 * blacklist. The loop stops after a pass that finds nothing.
 *
 * Writes `whitelist`/`blacklist` onto every atom and returns the same sets by atom id.
 */
export function findAtomTypes(
  structure: Pick<Structure, 'atoms' | 'bonds'>,
  rules: readonly AtomTypeRule[],
  options: FindAtomTypesOptions = {},
): Map<number, AtomTypeSets> {
  assertUniqueRuleNames(rules);
  const verbose = options.debug ?? Boolean(process.env.VERBOSE);
  const graph = options.graph ?? buildBondGraph(structure);

  const committed = new Map<number, AtomTypeSets>();
  for (const atom of structure.atoms) {
    committed.set(atom.id, { whitelist: new Set(), blacklist: new Set() });
  }

  const context: MatchContext = {
    graph,
    labelsOf: atomId => committed.get(atomId)?.whitelist ?? NO_LABELS,
  };

  let pass = 0;
  let foundSomething = true;
  while (foundSomething) {
    pass++;
    const accepted: { sets: AtomTypeSets; rule: AtomTypeRule }[] = [];

    for (const [atomId, sets] of committed) {
      for (const rule of rules) {
        if (sets.whitelist.has(rule.name) || sets.blacklist.has(rule.name)) continue;
        if (rule.matches(atomId, context)) {
          accepted.push({ sets, rule });
        }
      }
    }

    let committedCount = 0;
    for (const { sets, rule } of accepted) {
      // revoked by a rule committed earlier in this pass
      if (sets.blacklist.has(rule.name)) continue;
      sets.whitelist.add(rule.name);
      for (const overridden of rule.overrides) {
        sets.blacklist.add(overridden);
      }
      committedCount++;
    }

    foundSomething = committedCount > 0;
    if (verbose) {
      console.log(`[ATOM TYPER] pass ${pass}: ${committedCount} new match(es)`);
    }
  }

  for (const atom of structure.atoms) {
    const sets = committed.get(atom.id);
    if (!sets) continue;
    atom.whitelist = new Set(sets.whitelist);
    atom.blacklist = new Set(sets.blacklist);
    if (verbose) {
      console.log(
        `[ATOM TYPER] atom ${atom.name ?? atom.id}: whitelist: {${[...sets.whitelist].join(', ')}}, blacklist: {${[...sets.blacklist].join(', ')}}`,
      );
    }
  }

  return committed;
}

/**
 * Rule names an atom keeps after overrides, sorted.
 * More than one entry means two rules claim the atom without either
 * overriding the other; that is allowed and left to the caller.
 */
export function resolveAtomType(sets: AtomTypeSets): string[] {
  return difference([...sets.whitelist], [...sets.blacklist]).sort();
}

function assertUniqueRuleNames(rules: readonly AtomTypeRule[]): void {
  const seen = new Set<string>();
  for (const rule of rules) {
    if (seen.has(rule.name)) {
      throw new Error(`Found multiple rules named ${rule.name}`);
    }
    seen.add(rule.name);
  }
}
