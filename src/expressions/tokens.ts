import { LexError } from './errors';

export type TokenKind = 'Number' | 'Identifier' | 'Operator' | 'LeftParen' | 'RightParen' | 'Comma';

export type Operator = '+' | '-' | '*' | '/' | '^';

interface TokenBase {
  text: string;
  position: number; // Offset of the first character in the source
}

export interface NumberToken extends TokenBase {
  kind: 'Number';
  value: number;
}

export interface IdentifierToken extends TokenBase {
  kind: 'Identifier';
}

export interface OperatorToken extends TokenBase {
  kind: 'Operator';
  text: Operator;
}

export interface PunctuationToken extends TokenBase {
  kind: 'LeftParen' | 'RightParen' | 'Comma';
}

export type Token = NumberToken | IdentifierToken | OperatorToken | PunctuationToken;

const punctuation: Record<string, PunctuationToken['kind']> = {
  '(': 'LeftParen',
  ')': 'RightParen',
  ',': 'Comma',
};

function isOperator(char: string): char is Operator {
  return char === '+' || char === '-' || char === '*' || char === '/' || char === '^';
}

const isDigit = (char: string | undefined) => char !== undefined && char >= '0' && char <= '9';
const isWhitespace = (char: string) => /\s/.test(char);
const isIdentifierStart = (char: string) => /[A-Za-z_]/.test(char);
const isIdentifierPart = (char: string | undefined) => char !== undefined && /[A-Za-z0-9_]/.test(char);

/* Scans a number starting at `start` and returns the offset just past it.
 * Accepts `12`, `1.5`, `.5`, `2.` and an exponent part that has digits.
 */
function scanNumber(source: string, start: number): number {
  let current = start;
  while (isDigit(source[current])) current++;
  if (source[current] === '.') {
    current++;
    while (isDigit(source[current])) current++;
  }

  if (source[current] === 'e' || source[current] === 'E') {
    let exponent = current + 1;
    if (source[exponent] === '+' || source[exponent] === '-') exponent++;
    if (isDigit(source[exponent])) {
      while (isDigit(source[exponent])) exponent++;
      current = exponent;
    }
  }
  return current;
}

function* scan(source: string): Generator<Token, void, undefined> {
  let current = 0;
  while (current < source.length) {
    const char = source[current];

    if (isWhitespace(char)) {
      current++;
      continue;
    }

    if (isDigit(char) || (char === '.' && isDigit(source[current + 1]))) {
      const end = scanNumber(source, current);
      const text = source.slice(current, end);
      yield { kind: 'Number', text, value: Number(text), position: current };
      current = end;
      continue;
    }

    if (isIdentifierStart(char)) {
      let end = current + 1;
      while (isIdentifierPart(source[end])) end++;
      yield { kind: 'Identifier', text: source.slice(current, end), position: current };
      current = end;
      continue;
    }

    if (isOperator(char)) {
      yield { kind: 'Operator', text: char, position: current };
      current++;
      continue;
    }

    if (char in punctuation) {
      yield { kind: punctuation[char], text: char, position: current };
      current++;
      continue;
    }

    throw new LexError(char, current, source);
  }
}

/**
 * Lazily tokenizes `source`. Every iteration of the returned iterable starts
 * scanning from the beginning again; a LexError is thrown when iteration
 * reaches an unrecognized character.
 */
export function tokenize(source: string): Iterable<Token> {
  return {
    [Symbol.iterator]: () => scan(source),
  };
}
