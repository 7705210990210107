import elementTable from 'src/data/elements.json';

export const ATOMIC_NUMBERS: Readonly<Record<string, number>> = Object.fromEntries(
  elementTable.elements.map(element => [element.symbol, element.atomicNumber]),
);

/**
 * Accepted spellings of the force-field names shipped with a data directory,
 * keyed by lowercase alias.
 */
export const FORCEFIELD_ALIASES: Readonly<Record<string, string>> = Object.freeze({
  'opls-aa': 'oplsaa',
  oplsaa: 'oplsaa',
  opls: 'oplsaa',
  trappeua: 'trappeua',
});

export const FORCEFIELD_DIR_ENV = 'ATOMTYPER_FORCEFIELD_DIR';
export const DEFAULT_FORCEFIELD_DIR = 'forcefields';
