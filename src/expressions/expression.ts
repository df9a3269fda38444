import type { Node } from './types';
import { tokenize } from './tokens';
import { parse } from './parser';
import type { ValidatedAst } from './validator';
import { validate } from './validator';
import type { Bindings } from './evaluator';
import { evaluate } from './evaluator';
import type { SymbolRegistry } from './registry';
import { defaultRegistry } from './registry';
import { print } from './printer';

/**
 * A compiled function of its free variables. Built from source text in one go;
 * editing the text means compiling a new Expression.
 */
export class Expression {
  private constructor(
    public readonly source: string,
    private readonly ast: ValidatedAst
  ) {}

  static compile(source: string, registry: SymbolRegistry = defaultRegistry): Expression {
    const root = parse(tokenize(source), source);
    return new Expression(source, validate(root, registry, source));
  }

  get root(): Node {
    return this.ast.root;
  }

  get freeVariables(): ReadonlySet<string> {
    return this.ast.freeVariables;
  }

  get registry(): SymbolRegistry {
    return this.ast.registry;
  }

  evaluate(bindings: Bindings): number {
    return evaluate(this.ast, bindings);
  }

  toString(): string {
    return print(this.ast.root);
  }
}

export function compile(source: string, registry?: SymbolRegistry): Expression {
  return Expression.compile(source, registry);
}
