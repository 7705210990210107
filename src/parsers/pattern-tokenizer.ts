import { ATOMIC_NUMBERS } from 'src/constants';
import { PatternSyntaxError } from 'src/errors';

export type PatternTokenType =
  | 'LBRACKET'
  | 'RBRACKET'
  | 'LPAREN'
  | 'RPAREN'
  | 'OR'
  | 'AND'
  | 'HASH'
  | 'STAR'
  | 'DOLLAR'
  | 'NUMBER'
  | 'LABEL'
  | 'SYMBOL'
  | 'DEGREE'
  | 'RING_SIZE';

export interface PatternToken {
  type: PatternTokenType;
  value: string;
  position: number;
}

const PUNCTUATION: Record<string, PatternTokenType> = {
  '[': 'LBRACKET',
  ']': 'RBRACKET',
  '(': 'LPAREN',
  ')': 'RPAREN',
  ',': 'OR',
  ';': 'AND',
  '&': 'AND',
  '#': 'HASH',
  '*': 'STAR',
  $: 'DOLLAR',
};

const NUMBER_REGEX = /^\d+/;
const LABEL_REGEX = /^%[a-z_]+(?:[0-9][a-z_]?)*/;

/**
 * Split an atom-type pattern into tokens.
 * Element symbols use longest match against the periodic table, so `Cl` is
 * chlorine and `D`/`R` only become degree/ring-size markers where no element
 * symbol starts.
 */
export function tokenizeAtomTypePattern(pattern: string): PatternToken[] {
  const tokens: PatternToken[] = [];
  let pos = 0;

  while (pos < pattern.length) {
    const ch = pattern.charAt(pos);
    const remaining = pattern.substring(pos);

    const punctuation = PUNCTUATION[ch];
    if (punctuation) {
      tokens.push({ type: punctuation, value: ch, position: pos });
      pos++;
      continue;
    }

    const number = NUMBER_REGEX.exec(remaining);
    if (number) {
      tokens.push({ type: 'NUMBER', value: number[0], position: pos });
      pos += number[0].length;
      continue;
    }

    if (ch === '%') {
      const label = LABEL_REGEX.exec(remaining);
      if (!label) {
        throw new PatternSyntaxError(pattern, pos + 1, ['label name']);
      }
      tokens.push({ type: 'LABEL', value: label[0], position: pos });
      pos += label[0].length;
      continue;
    }

    const symbol = trySymbol(remaining);
    if (symbol) {
      tokens.push({ type: 'SYMBOL', value: symbol, position: pos });
      pos += symbol.length;
      continue;
    }

    if (ch === 'D') {
      tokens.push({ type: 'DEGREE', value: ch, position: pos });
      pos++;
      continue;
    }

    if (ch === 'R') {
      tokens.push({ type: 'RING_SIZE', value: ch, position: pos });
      pos++;
      continue;
    }

    throw new PatternSyntaxError(pattern, pos, ['element symbol', "'#'", "'*'", "'$('", "'%'", "'D'", "'R'"]);
  }

  return tokens;
}

function trySymbol(remaining: string): string | null {
  const twoLetter = remaining.substring(0, 2);
  if (twoLetter.length === 2 && ATOMIC_NUMBERS[twoLetter] !== undefined) {
    return twoLetter;
  }
  const oneLetter = remaining.substring(0, 1);
  if (ATOMIC_NUMBERS[oneLetter] !== undefined) {
    return oneLetter;
  }
  return null;
}
