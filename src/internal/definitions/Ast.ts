import type { Span } from "./Diagnostic.js"

export type { Span } from "./Diagnostic.js"

export type NodeId = string

export type UnaryOp = "Neg" | "Pos"
export type BinaryOp = "+" | "-" | "*" | "/" | "**"

export interface NumberLiteralNode {
  readonly _tag: "NumberLiteral"
  readonly id: NodeId
  readonly value: number
  /** Source text, used for exact rational exponents. */
  readonly text: string
  readonly span: Span
}

export interface StringLiteralNode {
  readonly _tag: "StringLiteral"
  readonly id: NodeId
  readonly value: string
  readonly span: Span
}

export interface BooleanLiteralNode {
  readonly _tag: "BooleanLiteral"
  readonly id: NodeId
  readonly value: boolean
  readonly span: Span
}

export interface ReferenceNode {
  readonly _tag: "Ref"
  readonly id: NodeId
  readonly name: string
  readonly span: Span
}

export interface UnaryNode {
  readonly _tag: "Unary"
  readonly id: NodeId
  readonly op: UnaryOp
  readonly expr: Expr
  readonly span: Span
}

export interface BinaryNode {
  readonly _tag: "Binary"
  readonly id: NodeId
  readonly op: BinaryOp
  readonly left: Expr
  readonly right: Expr
  readonly span: Span
}

export interface CallNode {
  readonly _tag: "Call"
  readonly id: NodeId
  readonly name: string
  readonly args: ReadonlyArray<Expr>
  readonly span: Span
}

/**
 * Single-parameter arrow function, only meaningful as a `LambdaUnit`
 * argument.
 */
export interface LambdaNode {
  readonly _tag: "Lambda"
  readonly id: NodeId
  readonly param: string
  readonly body: Expr
  readonly span: Span
}

export type Expr =
  | NumberLiteralNode
  | StringLiteralNode
  | BooleanLiteralNode
  | ReferenceNode
  | UnaryNode
  | BinaryNode
  | CallNode
  | LambdaNode

/**
 * `symbol = expression [, True|False]`, the note already split off.
 */
export interface StatementNode {
  readonly _tag: "Statement"
  readonly id: NodeId
  readonly symbol: string
  readonly expr: Expr
  /** Present when the statement carries a prefixable flag. */
  readonly prefixable?: boolean
  readonly span: Span
}
