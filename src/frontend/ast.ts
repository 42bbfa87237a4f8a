/**
 * Frontend AST contracts for register-description sources.
 *
 * This module defines types/interfaces only. The parser that produces these nodes lives
 * outside this package; the elaborator consumes them as-is and never mutates them.
 */
export interface SourcePosition {
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
  /** 0-based byte offset in the file. */
  offset: number;
}

/**
 * Source span with inclusive start and end positions.
 */
export interface SourceSpan {
  /** User-facing file path (as provided on input). */
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

/**
 * Base shape for all AST nodes.
 */
export interface BaseNode {
  kind: string;
  span: SourceSpan;
}

/**
 * Parsed compilation unit: every file of one root namespace, in load order.
 */
export interface ProgramNode extends BaseNode {
  kind: 'Program';
  entryFile: string;
  files: SourceFileNode[];
}

/**
 * A single parsed source file.
 */
export interface SourceFileNode extends BaseNode {
  kind: 'SourceFile';
  path: string;
  items: RootItemNode[];
}

/**
 * Items permitted at root scope.
 *
 * Root-level instantiations name the top-level address maps to elaborate.
 */
export type RootItemNode = StructDeclNode | PropertyDeclNode | ComponentDeclNode | InstanceNode;

/**
 * Items permitted inside a component body.
 */
export type BodyItemNode = ComponentDeclNode | InstanceNode | PropAssignNode;

export type ComponentKind = 'addrmap' | 'regfile' | 'reg' | 'field' | 'mem' | 'signal';

export const componentKinds: readonly ComponentKind[] = [
  'addrmap',
  'regfile',
  'reg',
  'field',
  'mem',
  'signal',
];

/**
 * `struct` declaration, optionally extending a base struct.
 */
export interface StructDeclNode extends BaseNode {
  kind: 'StructDecl';
  name: string;
  base?: string;
  fields: StructFieldNode[];
}

export interface StructFieldNode extends BaseNode {
  kind: 'StructField';
  name: string;
  typeExpr: TypeExprNode;
}

/**
 * User-defined `property` declaration.
 *
 * `components` lists the component kinds that may hold the property; `'all'` admits every kind.
 */
export interface PropertyDeclNode extends BaseNode {
  kind: 'PropertyDecl';
  name: string;
  typeExpr: TypeExprNode;
  components: ComponentKind[] | 'all';
  default?: ExprNode;
}

/**
 * Component template definition.
 *
 * Anonymous definitions (`reg { ... } r1;`) have no `name` and appear only as the
 * `component` of an {@link InstanceNode}.
 */
export interface ComponentDeclNode extends BaseNode {
  kind: 'ComponentDecl';
  componentKind: ComponentKind;
  name?: string;
  params: ParamDeclNode[];
  body: BodyItemNode[];
}

/**
 * Formal parameter of a component template: `#(longint SIZE = 32)`.
 */
export interface ParamDeclNode extends BaseNode {
  kind: 'ParamDecl';
  name: string;
  typeExpr: TypeExprNode;
  default?: ExprNode;
}

/**
 * Reference to a named component template by its type name.
 */
export interface ComponentTypeRefNode extends BaseNode {
  kind: 'ComponentTypeRef';
  name: string;
}

/**
 * Instantiation: `myReg #(.SIZE(16)) r1[4];`
 */
export interface InstanceNode extends BaseNode {
  kind: 'Instance';
  component: ComponentTypeRefNode | ComponentDeclNode;
  name: string;
  overrides: ParamOverrideNode[];
  /** Instance-array extent (`[k]`); absent for a single instance. */
  extent?: ExprNode;
}

/**
 * Caller-side named parameter binding: `.NAME(expr)`.
 */
export interface ParamOverrideNode extends BaseNode {
  kind: 'ParamOverride';
  name: string;
  value: ExprNode;
}

/**
 * Property assignment.
 *
 * `target` is empty for the enclosing component (`prop = v;`) and holds the instance path of a
 * previously declared descendant for dynamic assignments (`a.b->prop = v;`). A missing `value`
 * is the `prop;` shorthand.
 */
export interface PropAssignNode extends BaseNode {
  kind: 'PropAssign';
  target: string[];
  property: string;
  value?: ExprNode;
}

/**
 * Type expression variants.
 *
 * `TypeName` covers the built-in types (`longint`, `bit`, `boolean`, `string`, `accesstype`, ...,
 * `ref`) and struct names. Arrays are dynamically sized.
 */
export type TypeExprNode =
  | { kind: 'TypeName'; span: SourceSpan; name: string }
  | { kind: 'ArrayType'; span: SourceSpan; element: TypeExprNode };

export type UnaryOp = '+' | '-' | '~' | '!' | '&' | '~&' | '|' | '~|' | '^' | '~^' | '^~';

export type BinaryOp =
  | '+'
  | '-'
  | '*'
  | '/'
  | '%'
  | '&'
  | '|'
  | '^'
  | '~^'
  | '^~'
  | '**'
  | '<<'
  | '>>'
  | '=='
  | '!='
  | '<'
  | '>'
  | '<='
  | '>='
  | '&&'
  | '||';

/**
 * Expression variants.
 */
export type ExprNode =
  | {
      kind: 'IntLiteral';
      span: SourceSpan;
      value: bigint;
      /** Declared bit width of a sized literal (`4'hF`); unsized literals are 64 bits wide. */
      width?: number;
    }
  | { kind: 'BoolLiteral'; span: SourceSpan; value: boolean }
  | { kind: 'StringLiteral'; span: SourceSpan; value: string }
  | { kind: 'EnumLiteral'; span: SourceSpan; enumType: string; member: string }
  | { kind: 'Name'; span: SourceSpan; name: string }
  | { kind: 'Member'; span: SourceSpan; base: ExprNode; field: string }
  | { kind: 'Index'; span: SourceSpan; base: ExprNode; index: ExprNode }
  | { kind: 'StructLiteral'; span: SourceSpan; typeName: string; fields: StructLiteralFieldNode[] }
  | { kind: 'ArrayLiteral'; span: SourceSpan; elements: ExprNode[] }
  | { kind: 'Unary'; span: SourceSpan; op: UnaryOp; expr: ExprNode }
  | { kind: 'Binary'; span: SourceSpan; op: BinaryOp; left: ExprNode; right: ExprNode }
  | { kind: 'Ternary'; span: SourceSpan; cond: ExprNode; whenTrue: ExprNode; whenFalse: ExprNode }
  | { kind: 'WidthCast'; span: SourceSpan; width: ExprNode; expr: ExprNode }
  | { kind: 'BoolCast'; span: SourceSpan; expr: ExprNode };

export interface StructLiteralFieldNode extends BaseNode {
  kind: 'StructLiteralField';
  name: string;
  value: ExprNode;
}

/**
 * Union of all AST node types.
 */
export type Node =
  | ProgramNode
  | SourceFileNode
  | RootItemNode
  | BodyItemNode
  | StructFieldNode
  | ParamDeclNode
  | ComponentTypeRefNode
  | ParamOverrideNode
  | TypeExprNode
  | ExprNode
  | StructLiteralFieldNode;
