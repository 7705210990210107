import type { Atom, Structure } from 'types';
import { ATOMIC_NUMBERS } from 'src/constants';

/**
 * Structure with atom ids 0..n-1 in the order of `symbols`.
 */
export function buildStructure(symbols: string[], bonds: [number, number][]): Structure {
  const atoms: Atom[] = symbols.map((symbol, id) => ({
    id,
    symbol,
    name: `${symbol}${id}`,
    atomicNumber: ATOMIC_NUMBERS[symbol] ?? 0,
  }));
  return { atoms, bonds: bonds.map(([atom1, atom2]) => ({ atom1, atom2 })) };
}

export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

// 0,1: carbons; 2-4: H on 0; 5-7: H on 1
export function ethane(): Structure {
  return buildStructure(
    ['C', 'C', 'H', 'H', 'H', 'H', 'H', 'H'],
    [[0, 1], [0, 2], [0, 3], [0, 4], [1, 5], [1, 6], [1, 7]],
  );
}

// 0: CH3 carbon; 1: CH2 carbon; 2: O; 3: hydroxyl H; 4-6: H on 0; 7-8: H on 1
export function ethanol(): Structure {
  return buildStructure(
    ['C', 'C', 'O', 'H', 'H', 'H', 'H', 'H', 'H'],
    [[0, 1], [1, 2], [2, 3], [0, 4], [0, 5], [0, 6], [1, 7], [1, 8]],
  );
}

// 0: central carbon with three neighbors 1-3 (degree 3)
export function trigonalCarbon(): Structure {
  return buildStructure(['C', 'H', 'H', 'H'], [[0, 1], [0, 2], [0, 3]]);
}

// linear chain 0-1-2-3
export function butaneBackbone(): Structure {
  return buildStructure(['C', 'C', 'C', 'C'], [[0, 1], [1, 2], [2, 3]]);
}
