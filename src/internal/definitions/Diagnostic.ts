import { Data } from "effect"

/**
 * Structured diagnostic raised inside the definition pipeline. The builder
 * translates it into the public `ParseError`, `UndefinedSymbolError` or
 * `DefinitionError` once the source name and line are known.
 */
export type DefinitionPhase = "parse" | "evaluate"

export type DefinitionErrorCode =
  | "UnexpectedToken"
  | "TrailingInput"
  | "UnterminatedString"
  | "UnknownCharacter"
  | "MissingAssignment"
  | "InvalidExponent"
  | "IdentifierNotFound"
  | "UnsupportedFunction"
  | "ArityMismatch"
  | "TypeMismatch"
  | "LambdaUnitMisuse"
  | "QuantityFailure"
  | "DimensionMismatch"

export interface Span {
  readonly start: number
  readonly end: number
  readonly line: number
  readonly column: number
}

export interface DefinitionDiagnostic {
  readonly phase: DefinitionPhase
  readonly code: DefinitionErrorCode
  readonly message: string
  readonly span?: Span
  readonly snippet?: string
  /** Unbound name for `IdentifierNotFound`. */
  readonly symbol?: string
  /** Tagged error that made evaluation fail. */
  readonly cause?: unknown
}

export class DiagnosticError extends Data.TaggedError("DiagnosticError")<{
  readonly diagnostic: DefinitionDiagnostic
}> {
  override get message(): string {
    return this.diagnostic.message
  }
}

export const snippet = (text: string, column: number): string =>
  `${text}\n${" ".repeat(Math.max(0, column - 1))}^`
