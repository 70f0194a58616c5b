export type Node =
  | StatementBlock
  | Assign
  | BinarySetOp
  | VariableRef
  | Literal
  | Load
  | Print
  | Filter
  | FilterOut;

/** Nodes that produce a word set. */
export type Expression = Exclude<Node, StatementBlock | Print>;

export type SetOperator = '+' | '-';

export interface BaseNode {
  line: number;
}

export interface StatementBlock extends BaseNode {
  type: 'StatementBlock';
  body: Node[];
}

export interface Assign extends BaseNode {
  type: 'Assign';
  target: VariableRef;
  value: Expression;
}

export interface BinarySetOp extends BaseNode {
  type: 'BinarySetOp';
  operator: SetOperator;
  left: Expression;
  right: Expression;
}

export interface VariableRef extends BaseNode {
  type: 'VariableRef';
  slot: number;
  name: string;
}

export interface Literal extends BaseNode {
  type: 'Literal';
  words: string[];
}

export interface Load extends BaseNode {
  type: 'Load';
  source: Expression;
}

export interface Print extends BaseNode {
  type: 'Print';
  args: Expression[];
}

export interface Filter extends BaseNode {
  type: 'Filter';
  source: Expression;
  patterns: Expression;
}

export interface FilterOut extends BaseNode {
  type: 'FilterOut';
  source: Expression;
  patterns: Expression;
}

export interface VariableInfo {
  name: string;
  line: number;
}

/** A parsed program: the top-level block and every variable it declares, by slot. */
export interface Program {
  root: StatementBlock;
  variables: VariableInfo[];
}
