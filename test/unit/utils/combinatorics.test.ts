import { describe, it, expect } from 'vitest';
import { pairCombinations, permutations, tripleCombinations } from 'src/utils/combinatorics';

describe('permutations', () => {
  it('should yield ordered selections in positional order', () => {
    expect([...permutations(['a', 'b', 'c'], 2)]).toEqual([
      ['a', 'b'],
      ['a', 'c'],
      ['b', 'a'],
      ['b', 'c'],
      ['c', 'a'],
      ['c', 'b'],
    ]);
  });

  it('should yield one empty selection for k = 0', () => {
    expect([...permutations([1, 2], 0)]).toEqual([[]]);
  });

  it('should yield nothing when k exceeds the item count', () => {
    expect([...permutations([1, 2], 3)]).toEqual([]);
  });

  it('should be lazy', () => {
    const iterator = permutations([1, 2, 3, 4, 5, 6, 7, 8], 8);
    expect(iterator.next().value).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(iterator.next().value).toEqual([1, 2, 3, 4, 5, 6, 8, 7]);
  });
});

describe('pairCombinations', () => {
  it('should list unordered pairs', () => {
    expect(pairCombinations([1, 2, 3])).toEqual([
      [1, 2],
      [1, 3],
      [2, 3],
    ]);
    expect(pairCombinations([1])).toEqual([]);
  });
});

describe('tripleCombinations', () => {
  it('should list unordered triples', () => {
    expect(tripleCombinations([1, 2, 3, 4])).toEqual([
      [1, 2, 3],
      [1, 2, 4],
      [1, 3, 4],
      [2, 3, 4],
    ]);
    expect(tripleCombinations([1, 2])).toEqual([]);
  });
});
