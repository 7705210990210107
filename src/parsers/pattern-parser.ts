import type { AtomExpression, AtomPrimitive, PatternAtom, PatternNode } from 'src/types/pattern-types';
import type { PatternToken, PatternTokenType } from 'src/parsers/pattern-tokenizer';
import { tokenizeAtomTypePattern } from 'src/parsers/pattern-tokenizer';
import { ATOMIC_NUMBERS } from 'src/constants';
import { PatternSyntaxError } from 'src/errors';

const PRIMITIVE_START = ['element symbol', "'#'", "'*'", "'$('", "'%'", "'D'", "'R'"];

/**
 * Parse an atom-type definition such as `[C;D4]([H])([H])([H])[C]`.
 *
 * Grammar:
 *   pattern   := chain branch* tail?
 *   chain     := atom+
 *   branch    := '(' pattern ')'
 *   atom      := ('[' or_expr ']' | SYMBOL | '*') NUMBER?
 *   or_expr   := and_expr (',' and_expr)*
 *   and_expr  := primitive ((';' | '&') primitive)*
 *   primitive := SYMBOL | '#' NUMBER | '*' | '$(' pattern ')' | LABEL | 'D' NUMBER | 'R' NUMBER
 *
 * A bare element symbol or '*' outside brackets is shorthand for the bracketed
 * atom holding just that primitive. Ring-size and sub-pattern primitives are
 * accepted here and rejected when matched.
 */
export function parseAtomTypePattern(pattern: string): PatternNode {
  const parser = new PatternParser(pattern, tokenizeAtomTypePattern(pattern));
  const root = parser.parsePattern();
  parser.expectEnd();
  return root;
}

class PatternParser {
  private index = 0;

  constructor(
    private readonly text: string,
    private readonly tokens: PatternToken[],
  ) {}

  parsePattern(): PatternNode {
    const first = this.parseAtomNode();
    let last = first;

    while (this.peekAtomStart()) {
      const node = this.parseAtomNode();
      last.next = node;
      last = node;
    }

    while (this.peek('LPAREN')) {
      this.advance();
      last.branches.push(this.parsePattern());
      this.expect('RPAREN', "')'");
    }

    // an atom following the branches starts the unparenthesized last branch
    if (this.peekAtomStart()) {
      last.next = this.parsePattern();
    }

    return first;
  }

  expectEnd(): void {
    const token = this.current();
    if (token) {
      const expected = token.type === 'RPAREN' ? ['end of pattern'] : ["'('", 'end of pattern'];
      throw new PatternSyntaxError(this.text, token.position, expected);
    }
  }

  private parseAtomNode(): PatternNode {
    const open = this.current();
    let expression: AtomExpression;

    if (open?.type === 'SYMBOL' || open?.type === 'STAR') {
      expression = this.parsePrimitive();
    } else {
      this.expect('LBRACKET', "'['");
      expression = this.parseOr();
      this.expect('RBRACKET', "']'");
    }

    let label: number | null = null;
    const labelToken = this.current();
    if (labelToken?.type === 'NUMBER') {
      this.advance();
      label = parseInt(labelToken.value, 10);
    }

    const atom: PatternAtom = { expression, label, position: open?.position ?? this.text.length };
    return { atom, branches: [], next: null };
  }

  private parseOr(): AtomExpression {
    let left = this.parseAnd();
    while (this.peek('OR')) {
      this.advance();
      left = { operator: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): AtomExpression {
    let left: AtomExpression = this.parsePrimitive();
    while (this.peek('AND')) {
      this.advance();
      left = { operator: 'and', left, right: this.parsePrimitive() };
    }
    return left;
  }

  private parsePrimitive(): AtomPrimitive {
    const token = this.current();
    if (!token) {
      throw new PatternSyntaxError(this.text, this.text.length, PRIMITIVE_START);
    }

    switch (token.type) {
      case 'SYMBOL': {
        this.advance();
        return { type: 'element', symbol: token.value, value: ATOMIC_NUMBERS[token.value] ?? 0 };
      }
      case 'HASH':
        this.advance();
        return { type: 'atomic_number', value: this.expectNumber() };
      case 'STAR':
        this.advance();
        return { type: 'any' };
      case 'DOLLAR': {
        this.advance();
        this.expect('LPAREN', "'('");
        const pattern = this.parsePattern();
        this.expect('RPAREN', "')'");
        return { type: 'sub_pattern', pattern };
      }
      case 'LABEL':
        this.advance();
        return { type: 'has_label', name: token.value.substring(1) };
      case 'DEGREE':
        this.advance();
        return { type: 'neighbor_count', value: this.expectNumber() };
      case 'RING_SIZE':
        this.advance();
        return { type: 'ring_size', value: this.expectNumber() };
      default:
        throw new PatternSyntaxError(this.text, token.position, PRIMITIVE_START);
    }
  }

  private expectNumber(): number {
    return parseInt(this.expect('NUMBER', 'number').value, 10);
  }

  private expect(type: PatternTokenType, description: string): PatternToken {
    const token = this.current();
    if (!token || token.type !== type) {
      throw new PatternSyntaxError(this.text, token?.position ?? this.text.length, [description]);
    }
    this.advance();
    return token;
  }

  private peekAtomStart(): boolean {
    return this.peek('LBRACKET') || this.peek('SYMBOL') || this.peek('STAR');
  }

  private peek(type: PatternTokenType): boolean {
    return this.current()?.type === type;
  }

  private current(): PatternToken | undefined {
    return this.tokens[this.index];
  }

  private advance(): void {
    this.index++;
  }
}
