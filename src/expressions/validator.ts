import type { Node } from './types';
import type { SymbolRegistry } from './registry';
import { defaultRegistry, lookupFunction, lookupVariable } from './registry';
import { ArityMismatchError, UnknownIdentifierError } from './errors';

const validated: unique symbol = Symbol('validated');

/**
 * An AST whose every name resolves against `registry` with the right arity.
 * Only `validate` can produce one, so the evaluator never meets an unknown name.
 */
export interface ValidatedAst {
  readonly [validated]: true;
  readonly root: Node;
  readonly registry: SymbolRegistry;
  /** Independent variables the expression reads, in order of first use. */
  readonly freeVariables: ReadonlySet<string>;
}

export function validate(ast: Node, registry: SymbolRegistry = defaultRegistry, source = ''): ValidatedAst {
  const freeVariables = new Set<string>();

  const visit = (node: Node): void => {
    switch (node.type) {
      case 'Constant':
        return;

      case 'Variable': {
        const variable = lookupVariable(registry, node.name);
        if (!variable) {
          throw new UnknownIdentifierError(node.name, 'variable', node.position, source);
        }
        if (variable.role === 'independent') {
          freeVariables.add(node.name);
        }
        return;
      }

      case 'UnaryOp':
        visit(node.operand);
        return;

      case 'BinaryOp':
        visit(node.left);
        visit(node.right);
        return;

      case 'Call': {
        const fn = lookupFunction(registry, node.name);
        if (!fn) {
          throw new UnknownIdentifierError(node.name, 'function', node.position, source);
        }
        if (node.args.length !== fn.arity) {
          throw new ArityMismatchError(node.name, fn.arity, node.args.length, node.position, source);
        }
        node.args.forEach(visit);
        return;
      }

      default: {
        const unreachable: never = node;
        throw new Error(`Unhandled node: ${JSON.stringify(unreachable)}`);
      }
    }
  };

  visit(ast);

  return { [validated]: true, root: ast, registry, freeVariables };
}
