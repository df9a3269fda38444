export type NodeType = 'Constant' | 'Variable' | 'UnaryOp' | 'BinaryOp' | 'Call';

export type BinaryOperator = '+' | '-' | '*' | '/' | '^';
export type UnaryOperator = '-';

interface NodeBase {
  readonly position: number;
}

export interface ConstantNode extends NodeBase {
  readonly type: 'Constant';
  readonly value: number;
}

export interface VariableNode extends NodeBase {
  readonly type: 'Variable';
  readonly name: string;
}

export interface UnaryOpNode extends NodeBase {
  readonly type: 'UnaryOp';
  readonly operator: UnaryOperator;
  readonly operand: Node;
}

export interface BinaryOpNode extends NodeBase {
  readonly type: 'BinaryOp';
  readonly operator: BinaryOperator;
  readonly left: Node;
  readonly right: Node;
}

export interface CallNode extends NodeBase {
  readonly type: 'Call';
  readonly name: string;
  readonly args: readonly Node[];
}

export type Node = ConstantNode | VariableNode | UnaryOpNode | BinaryOpNode | CallNode;

export function createConstantNode(value: number, position: number): ConstantNode {
  return { type: 'Constant', value, position };
}

export function createVariableNode(name: string, position: number): VariableNode {
  return { type: 'Variable', name, position };
}

export function createUnaryOpNode(operator: UnaryOperator, operand: Node, position: number): UnaryOpNode {
  return { type: 'UnaryOp', operator, operand, position };
}

export function createBinaryOpNode(
  operator: BinaryOperator,
  left: Node,
  right: Node,
  position: number
): BinaryOpNode {
  return { type: 'BinaryOp', operator, left, right, position };
}

export function createCallNode(name: string, args: Node[], position: number): CallNode {
  return { type: 'Call', name, args, position };
}
