/**
 * Errors raised while parsing patterns, matching rules and loading force fields
 */

export class PatternSyntaxError extends Error {
  constructor(
    public pattern: string,
    public position: number,
    public expected: string[],
  ) {
    const found = position < pattern.length ? `'${pattern[position]}'` : 'end of pattern';
    super(`Syntax error in pattern '${pattern}' at position ${position}: expected ${expected.join(' or ')}, found ${found}`);
    this.name = 'PatternSyntaxError';
  }
}

export class UnsupportedFeatureError extends Error {
  constructor(public feature: 'ring_size' | 'sub_pattern') {
    super(`${feature} feature is not yet implemented`);
    this.name = 'UnsupportedFeatureError';
  }
}

export class ForcefieldNotFoundError extends Error {
  constructor(public path: string) {
    super(`Force field file not found: ${path}`);
    this.name = 'ForcefieldNotFoundError';
  }
}
