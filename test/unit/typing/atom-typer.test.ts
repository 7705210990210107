import { describe, it, expect, vi, afterEach } from 'vitest';
import { AtomTypeRule } from 'src/typing/atom-type-rule';
import { findAtomTypes, resolveAtomType } from 'src/typing/atom-typer';
import { UnsupportedFeatureError } from 'src/errors';
import { ethane, ethanol, trigonalCarbon } from '../fixtures';

const alkaneRules = (): AtomTypeRule[] => [
  new AtomTypeRule('opls_135', '[#6;D4]'),
  new AtomTypeRule('opls_136', '[#6;D4;%opls_135]', ['opls_135']),
];

const alcoholRules = (): AtomTypeRule[] => [
  new AtomTypeRule('alcohol_o', '[O;D2]([H])[C]'),
  new AtomTypeRule('alcohol_h', '[H][O;%alcohol_o]'),
  new AtomTypeRule('alcohol_c', '[C][O;%alcohol_o]'),
  new AtomTypeRule('alkyl_h', '[H][C]'),
];

describe('AtomTypeRule', () => {
  it('should parse its pattern on construction', () => {
    const rule = new AtomTypeRule('opls_136', '[#6;D4;%opls_135]', ['opls_135']);
    expect(rule.ast.atom.position).toBe(0);
    expect(rule.overrides.has('opls_135')).toBe(true);
    expect(rule.toString()).toBe('Rule(opls_136, [#6;D4;%opls_135], {opls_135})');
  });

  it('should surface pattern syntax errors', () => {
    expect(() => new AtomTypeRule('broken', '[C')).toThrow('expected \']\'');
  });
});

describe('findAtomTypes', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should let a later rule override one it depends on', () => {
    const result = findAtomTypes(ethane(), alkaneRules());

    for (const id of [0, 1]) {
      expect(result.get(id)?.whitelist).toEqual(new Set(['opls_135', 'opls_136']));
      expect(result.get(id)?.blacklist).toEqual(new Set(['opls_135']));
    }
    const carbon = result.get(0);
    expect(carbon && resolveAtomType(carbon)).toEqual(['opls_136']);
    expect(result.get(2)?.whitelist).toEqual(new Set());
  });

  it('should write the sets onto the atoms', () => {
    const structure = ethane();
    findAtomTypes(structure, alkaneRules());
    expect(structure.atoms[1]?.whitelist).toEqual(new Set(['opls_135', 'opls_136']));
    expect(structure.atoms[5]?.blacklist).toEqual(new Set());
  });

  it('should propagate labels to neighbors over passes', () => {
    const result = findAtomTypes(ethanol(), alcoholRules());
    const types = [...result.entries()].map(([id, sets]) => [id, resolveAtomType(sets)]);
    expect(types).toEqual([
      [0, []],
      [1, ['alcohol_c']],
      [2, ['alcohol_o']],
      [3, ['alcohol_h']],
      [4, ['alkyl_h']],
      [5, ['alkyl_h']],
      [6, ['alkyl_h']],
      [7, ['alkyl_h']],
      [8, ['alkyl_h']],
    ]);
  });

  it('should reach the same fixed point when run again', () => {
    const structure = ethanol();
    const first = findAtomTypes(structure, alcoholRules());
    const second = findAtomTypes(structure, alcoholRules());
    expect(second).toEqual(first);
  });

  it('should reset sets left over from an earlier run', () => {
    const structure = ethane();
    for (const atom of structure.atoms) {
      atom.whitelist = new Set(['stale']);
      atom.blacklist = new Set(['opls_135']);
    }
    const result = findAtomTypes(structure, alkaneRules());
    expect(result.get(0)?.whitelist).toEqual(new Set(['opls_135', 'opls_136']));
    expect(structure.atoms[3]?.whitelist).toEqual(new Set());
  });

  it('should always blacklist the overrides of every matched rule', () => {
    const rules = alkaneRules();
    const result = findAtomTypes(ethane(), rules);
    for (const sets of result.values()) {
      for (const rule of rules) {
        if (!sets.whitelist.has(rule.name)) continue;
        for (const overridden of rule.overrides) {
          expect(sets.blacklist.has(overridden)).toBe(true);
        }
      }
    }
  });

  it('should type an atom from its own neighborhood only', () => {
    const rule = new AtomTypeRule('c_any4', '[#6;D4](*)(*)(*)*');
    expect(findAtomTypes(ethane(), [rule]).get(0)?.whitelist).toEqual(new Set(['c_any4']));
    expect(findAtomTypes(trigonalCarbon(), [rule]).get(0)?.whitelist).toEqual(new Set());
  });

  it('should leave overlapping rules for the caller to resolve', () => {
    const rules = [new AtomTypeRule('c_sym', '[C]'), new AtomTypeRule('c_any', '[#6]')];
    const sets = findAtomTypes(ethane(), rules).get(0);
    expect(sets && resolveAtomType(sets)).toEqual(['c_any', 'c_sym']);
  });

  it('should not grant a rule revoked earlier in the same pass', () => {
    const rules = [
      new AtomTypeRule('c_sym', '[C]', ['c_any']),
      new AtomTypeRule('c_any', '[#6]'),
      new AtomTypeRule('c_on_any', '[C;%c_any]'),
    ];
    const sets = findAtomTypes(ethane(), rules).get(0);
    expect(sets?.whitelist).toEqual(new Set(['c_sym']));
    expect(sets?.blacklist).toEqual(new Set(['c_any']));
  });

  it('should reject duplicate rule names', () => {
    const rules = [new AtomTypeRule('opls_135', '[C]'), new AtomTypeRule('opls_135', '[#6]')];
    expect(() => findAtomTypes(ethane(), rules)).toThrow('Found multiple rules named opls_135');
  });

  it('should propagate unsupported primitives', () => {
    expect(() => findAtomTypes(ethane(), [new AtomTypeRule('ring', '[R5]')])).toThrow(UnsupportedFeatureError);
  });

  it('should report each pass when debugging', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    findAtomTypes(ethane(), alkaneRules(), { debug: true });
    expect(log).toHaveBeenCalledWith('[ATOM TYPER] pass 1: 2 new match(es)');
    expect(log).toHaveBeenCalledWith('[ATOM TYPER] pass 2: 2 new match(es)');
    expect(log).toHaveBeenCalledWith('[ATOM TYPER] pass 3: 0 new match(es)');
    expect(log).toHaveBeenCalledWith(
      '[ATOM TYPER] atom C0: whitelist: {opls_135, opls_136}, blacklist: {opls_135}',
    );
  });
});
