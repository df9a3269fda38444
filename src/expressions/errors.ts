/* Error taxonomy of the expression pipeline.
 *
 * Compile-time failures (lexing, parsing, binding) extend ExpressionError and
 * point at a character offset of the source text. Domain errors happen per
 * evaluation and only ever degrade a single sample point.
 */

export class ExpressionError extends Error {
  constructor(
    public readonly reason: string,
    public readonly position: number,
    public readonly source: string
  ) {
    // Only the line holding the error is shown; tabs before the caret are kept
    // so it lines up however the terminal expands them
    const preceding = source.slice(0, position).split('\n');
    const lineNumber = preceding.length;
    const prefix = preceding[lineNumber - 1] ?? '';
    const currentLine = source.split('\n')[lineNumber - 1] ?? '';

    const formattedMessage = [
      reason,
      `at line ${lineNumber}, column ${prefix.length + 1}`,
      '',
      currentLine,
      prefix.replace(/[^\t]/g, ' ') + '^',
    ].join('\n');

    super(formattedMessage);
    this.name = 'ExpressionError';
  }
}

export class LexError extends ExpressionError {
  constructor(
    public readonly char: string,
    position: number,
    source: string
  ) {
    super(`Unexpected character: ${char}`, position, source);
    this.name = 'LexError';
  }
}

export class ExpressionSyntaxError extends ExpressionError {
  constructor(
    public readonly expected: string,
    public readonly found: string,
    position: number,
    source: string,
    reason = `Expected ${expected} but found ${found}`
  ) {
    super(reason, position, source);
    this.name = 'SyntaxError';
  }
}

export type IdentifierRole = 'variable' | 'function';

export class UnknownIdentifierError extends ExpressionError {
  constructor(
    public readonly identifier: string,
    public readonly role: IdentifierRole,
    position: number,
    source: string
  ) {
    super(`Unknown ${role}: ${identifier}`, position, source);
    this.name = 'UnknownIdentifier';
  }
}

export class ArityMismatchError extends ExpressionError {
  constructor(
    public readonly identifier: string,
    public readonly expected: number,
    public readonly got: number,
    position: number,
    source: string
  ) {
    super(
      `${identifier}() takes ${expected} argument${expected === 1 ? '' : 's'} but got ${got}`,
      position,
      source
    );
    this.name = 'ArityMismatch';
  }
}

export type DomainErrorKind = 'DivByZero' | 'InvalidPow' | 'LogDomain' | 'SqrtDomain' | 'NonFinite';

const domainMessages: Record<DomainErrorKind, string> = {
  DivByZero: 'Division by zero',
  InvalidPow: 'Negative base raised to a non-integer power',
  LogDomain: 'Logarithm of a non-positive number',
  SqrtDomain: 'Square root of a negative number',
  NonFinite: 'Result is not a finite number',
};

export class DomainError extends Error {
  constructor(
    public readonly kind: DomainErrorKind,
    public readonly position: number
  ) {
    super(domainMessages[kind]);
    this.name = 'DomainError';
  }
}

export class InvalidRangeError extends Error {
  constructor(
    public readonly low: number,
    public readonly high: number
  ) {
    super(`Invalid range: low (${low}) must be finite and less than high (${high})`);
    this.name = 'InvalidRange';
  }
}

export class InvalidCountError extends Error {
  constructor(public readonly count: number) {
    super(`Invalid sample count: ${count} (need an integer of at least 2)`);
    this.name = 'InvalidCount';
  }
}

export function isExpressionError(e: unknown): e is ExpressionError {
  return e instanceof ExpressionError;
}
