/**
 * Lazy k-permutations of `items` (ordered selections without repetition),
 * in lexicographic order of positions. Yields a single empty selection for k = 0.
 */
export function* permutations<T>(items: readonly T[], k: number): Generator<T[]> {
  if (k > items.length || k < 0) return;

  const used = new Set<number>();
  const selection: T[] = [];

  function* extend(): Generator<T[]> {
    if (selection.length === k) {
      yield [...selection];
      return;
    }
    for (const [index, item] of items.entries()) {
      if (used.has(index)) continue;
      used.add(index);
      selection.push(item);
      yield* extend();
      selection.pop();
      used.delete(index);
    }
  }

  yield* extend();
}

/**
 * Unordered pairs of `items`, in order of first appearance.
 */
export function pairCombinations<T>(items: readonly T[]): [T, T][] {
  const result: [T, T][] = [];
  items.forEach((first, index) => {
    for (const second of items.slice(index + 1)) {
      result.push([first, second]);
    }
  });
  return result;
}

/**
 * Unordered triples of `items`, in order of first appearance.
 */
export function tripleCombinations<T>(items: readonly T[]): [T, T, T][] {
  const result: [T, T, T][] = [];
  items.forEach((first, index) => {
    for (const [second, third] of pairCombinations(items.slice(index + 1))) {
      result.push([first, second, third]);
    }
  });
  return result;
}
