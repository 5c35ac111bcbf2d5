import { Either, Option } from "effect"
import Fraction from "fraction.js"
import { ExponentVector } from "../../Exponents.js"
import { LambdaUnit } from "../../LambdaUnit.js"
import { Quantity, add, divide, multiply, power, subtract } from "../../Quantity.js"
import type { SymbolEntry } from "../../SymbolEntry.js"
import type { LookupError } from "../../Errors.js"
import type { Rational } from "../rational.js"
import type { BinaryNode, CallNode, Expr, LambdaNode, Span } from "./Ast.js"
import { DiagnosticError, type DefinitionErrorCode } from "./Diagnostic.js"

/**
 * Names visible to an expression. `snapshot` freezes the current bindings
 * for arrow functions created now and called later.
 */
export interface Scope {
  readonly lookup: (name: string) => Either.Either<SymbolEntry, LookupError>
  readonly snapshot: () => Scope
}

interface QuantityValue {
  readonly _tag: "Quantity"
  readonly quantity: Quantity
  /** Exact value of dimensionless results built from decimal literals. */
  readonly exact: Option.Option<Rational>
}

interface LambdaUnitValue {
  readonly _tag: "LambdaUnit"
  readonly unit: LambdaUnit
}

interface TextValue {
  readonly _tag: "Text"
  readonly value: string
}

interface FlagValue {
  readonly _tag: "Flag"
  readonly value: boolean
}

interface BuiltinValue {
  readonly _tag: "Builtin"
  readonly name: string
  readonly call: (args: ReadonlyArray<Value>, node: CallNode) => Value
}

interface ClosureValue {
  readonly _tag: "Closure"
  readonly node: LambdaNode
  readonly scope: Scope
  readonly locals: ReadonlyMap<string, Value>
}

export type Value = QuantityValue | LambdaUnitValue | TextValue | FlagValue | BuiltinValue | ClosureValue

interface EvalContext {
  readonly scope: Scope
  readonly locals: ReadonlyMap<string, Value>
}

// Exact tracking is only for small rationals such as exponents.
const EXACT_LIMIT = 2 ** 31
const MAX_EXACT_POWER = 64

const describeValue: Record<Value["_tag"], string> = {
  Quantity: "a quantity",
  LambdaUnit: "a lambda unit",
  Text: "a string",
  Flag: "a boolean",
  Builtin: "a function",
  Closure: "an arrow function",
}

const fail = (
  span: Span,
  code: DefinitionErrorCode,
  message: string,
  extra: { readonly symbol?: string; readonly cause?: unknown } = {},
): never => {
  throw new DiagnosticError({
    diagnostic: { phase: "evaluate", code, message, span, ...extra },
  })
}

const bounded = (value: Rational): Option.Option<Rational> =>
  Math.abs(value.n) < EXACT_LIMIT && value.d < EXACT_LIMIT ? Option.some(value) : Option.none()

const scalar = (value: number, exact: Option.Option<Rational> = Option.none()): QuantityValue => ({
  _tag: "Quantity",
  quantity: new Quantity(value),
  exact,
})

const quantityValue = (quantity: Quantity): QuantityValue => ({ _tag: "Quantity", quantity, exact: Option.none() })

const literalExact = (text: string): Option.Option<Rational> =>
  /^\d+(?:\.\d+)?$/.test(text) ? bounded(new Fraction(text)) : Option.none()

const isPlainNumber = (value: QuantityValue): boolean =>
  value.quantity.dimension.isEmpty && value.quantity.display.isEmpty

const unwrap = <A, E>(either: Either.Either<A, E>, span: Span, message: (error: E) => string): A =>
  Either.getOrElse(either, (error) => fail(span, "QuantityFailure", message(error), { cause: error }))

const messageOf = (error: unknown): string => (error instanceof Error ? error.message : String(error))

const expectQuantity = (value: Value, span: Span, role: string): QuantityValue =>
  value._tag === "Quantity"
    ? value
    : fail(
        span,
        value._tag === "LambdaUnit" ? "LambdaUnitMisuse" : "TypeMismatch",
        `${role} must be a quantity, got ${describeValue[value._tag]}`,
      )

const expectDimensionless = (value: Value, span: Span, role: string): number => {
  const quantity = expectQuantity(value, span, role).quantity
  if (!quantity.dimension.isEmpty) {
    fail(span, "TypeMismatch", `${role} must be dimensionless, got dimension ${quantity.dimension.toString()}`)
  }
  return quantity.value
}

const expectText = (value: Value, span: Span, role: string): string =>
  value._tag === "Text" ? value.value : fail(span, "TypeMismatch", `${role} must be a string, got ${describeValue[value._tag]}`)

const expectClosure = (value: Value, span: Span, role: string): ClosureValue =>
  value._tag === "Closure"
    ? value
    : fail(span, "TypeMismatch", `${role} must be an arrow function, got ${describeValue[value._tag]}`)

const parseVector = (text: string, span: Span): ExponentVector =>
  Either.getOrElse(ExponentVector.parse(text), (error) =>
    fail(span, "InvalidExponent", `Invalid exponent string '${text}': ${error.problem}`, { cause: error }),
  )

const checkArity = (node: CallNode, args: ReadonlyArray<unknown>, min: number, max: number): void => {
  if (args.length < min || args.length > max) {
    const expected = min === max ? `${min}` : `${min} to ${max}`
    fail(node.span, "ArityMismatch", `${node.name} expects ${expected} argument(s), got ${args.length}`)
  }
}

const argumentAt = (node: CallNode, args: ReadonlyArray<Value>, index: number): readonly [Value, Span] => {
  const value = args[index]
  const span = node.args[index]?.span ?? node.span
  return value ? [value, span] : fail(span, "ArityMismatch", `${node.name} is missing argument ${index + 1}`)
}

const mathFunction = (name: string, fn: (x: number) => number): BuiltinValue => ({
  _tag: "Builtin",
  name,
  call: (args, node) => {
    checkArity(node, args, 1, 1)
    const [value, span] = argumentAt(node, args, 0)
    return scalar(fn(expectDimensionless(value, span, `Argument of ${name}`)))
  },
})

const makeQuantity: BuiltinValue["call"] = (args, node) => {
  checkArity(node, args, 2, 3)
  const [valueArg, valueSpan] = argumentAt(node, args, 0)
  const [dimensionArg, dimensionSpan] = argumentAt(node, args, 1)
  const value = expectDimensionless(valueArg, valueSpan, "Quantity value")
  const dimension = parseVector(expectText(dimensionArg, dimensionSpan, "Dimension"), dimensionSpan)
  const displayArg = args[2]
  const display =
    displayArg === undefined
      ? ExponentVector.empty
      : parseVector(expectText(displayArg, node.args[2]?.span ?? node.span, "Display unit"), node.span)
  return quantityValue(new Quantity(value, dimension, display))
}

const makeLambdaUnit: BuiltinValue["call"] = (args, node) => {
  checkArity(node, args, 2, 3)
  const [forwardArg, forwardSpan] = argumentAt(node, args, 0)
  const [inverseArg, inverseSpan] = argumentAt(node, args, 1)
  const forward = expectClosure(forwardArg, forwardSpan, "LambdaUnit forward")
  const inverse = expectClosure(inverseArg, inverseSpan, "LambdaUnit inverse")

  const toQuantity = (value: number): Quantity =>
    expectQuantity(callClosure(forward, scalar(value)), forward.node.body.span, "LambdaUnit forward result").quantity
  const toNumber = (quantity: Quantity): number =>
    expectDimensionless(callClosure(inverse, quantityValue(quantity)), inverse.node.body.span, "LambdaUnit inverse result")

  // forward is evaluated at definition time; its codomain fixes the dimension
  const dimension = toQuantity(0).dimension
  const dimensionArg = args[2]
  if (dimensionArg !== undefined) {
    const declaredSpan = node.args[2]?.span ?? node.span
    const declared = parseVector(expectText(dimensionArg, declaredSpan, "Dimension"), declaredSpan)
    if (!declared.equals(dimension)) {
      fail(
        declaredSpan,
        "DimensionMismatch",
        `LambdaUnit forward returns dimension ${dimension.toString()}, not the declared ${declared.toString()}`,
      )
    }
  }
  return { _tag: "LambdaUnit", unit: new LambdaUnit({ forward: toQuantity, inverse: toNumber, dimension }) }
}

/**
 * The only functions and constants an expression can reach besides
 * previously defined symbols.
 */
const BUILTINS: ReadonlyMap<string, Value> = new Map<string, Value>([
  ["pi", scalar(Math.PI)],
  ["exp", mathFunction("exp", Math.exp)],
  ["log", mathFunction("log", Math.log)],
  ["log10", mathFunction("log10", Math.log10)],
  [
    "sqrt",
    {
      _tag: "Builtin",
      name: "sqrt",
      call: (args, node) => {
        checkArity(node, args, 1, 1)
        const [value, span] = argumentAt(node, args, 0)
        const base = expectQuantity(value, span, "Argument of sqrt")
        return quantityValue(unwrap(power(base.quantity, new Fraction(1, 2)), node.span, messageOf))
      },
    },
  ],
  ["Quantity", { _tag: "Builtin", name: "Quantity", call: makeQuantity }],
  ["Unit", { _tag: "Builtin", name: "Unit", call: makeQuantity }],
  ["LambdaUnit", { _tag: "Builtin", name: "LambdaUnit", call: makeLambdaUnit }],
])

const fromEntry = (entry: SymbolEntry): Value =>
  entry._tag === "LambdaUnit" ? { _tag: "LambdaUnit", unit: entry.unit } : quantityValue(entry.quantity)

const resolveName = (name: string, span: Span, ctx: EvalContext): Value => {
  const local = ctx.locals.get(name)
  if (local) {
    return local
  }
  const entry = ctx.scope.lookup(name)
  if (Either.isRight(entry)) {
    return fromEntry(entry.right)
  }
  const builtin = BUILTINS.get(name)
  if (builtin) {
    return builtin
  }
  return fail(span, "IdentifierNotFound", `"${name}" is not defined`, { symbol: name })
}

const callClosure = (closure: ClosureValue, argument: Value): Value => {
  const locals = new Map(closure.locals)
  locals.set(closure.node.param, argument)
  return evaluate(closure.node.body, { scope: closure.scope, locals })
}

const toExponent = (value: QuantityValue, span: Span): number | Rational => {
  if (Option.isSome(value.exact)) {
    return value.exact.value
  }
  const numeric = value.quantity.value
  if (!Number.isFinite(numeric)) {
    return fail(span, "InvalidExponent", `Exponent ${numeric} is not finite`)
  }
  return new Fraction(numeric)
}

const exactBinary = (op: BinaryNode["op"], left: Rational, right: Rational): Option.Option<Rational> => {
  switch (op) {
    case "+":
      return bounded(left.add(right))
    case "-":
      return bounded(left.sub(right))
    case "*":
      return bounded(left.mul(right))
    case "/":
      return right.equals(0) ? Option.none() : bounded(left.div(right))
    case "**":
      return right.d === 1 && Math.abs(right.valueOf()) <= MAX_EXACT_POWER && !(left.equals(0) && right.s < 0)
        ? Option.flatMap(Option.fromNullable(left.pow(right)), bounded)
        : Option.none()
  }
}

const evaluateQuantities = (node: BinaryNode, left: QuantityValue, right: QuantityValue): QuantityValue => {
  const a = left.quantity
  const b = right.quantity
  const exact = Option.isSome(left.exact) && Option.isSome(right.exact)
    ? exactBinary(node.op, left.exact.value, right.exact.value)
    : Option.none()
  const withExact = (quantity: Quantity): QuantityValue => ({ _tag: "Quantity", quantity, exact })
  switch (node.op) {
    case "+":
      return withExact(unwrap(add(a, b), node.span, messageOf))
    case "-":
      return withExact(unwrap(subtract(a, b), node.span, messageOf))
    case "*":
      return withExact(multiply(a, b))
    case "/":
      return withExact(divide(a, b))
    case "**": {
      if (!b.dimension.isEmpty) {
        return fail(node.right.span, "TypeMismatch", `Exponent must be dimensionless, got dimension ${b.dimension.toString()}`)
      }
      const exponent = isPlainNumber(left) && Option.isNone(right.exact) ? b.value : toExponent(right, node.right.span)
      return withExact(unwrap(power(a, exponent), node.span, messageOf))
    }
  }
}

const LAMBDA_USAGE = "a lambda unit can only be used as number * unit or quantity / unit"

const evaluateBinary = (node: BinaryNode, ctx: EvalContext): Value => {
  const left = evaluate(node.left, ctx)
  const right = evaluate(node.right, ctx)

  if (right._tag === "LambdaUnit" && left._tag === "Quantity") {
    if (node.op === "*") {
      const n = left.quantity
      if (!n.dimension.isEmpty) {
        return fail(node.span, "LambdaUnitMisuse", `${LAMBDA_USAGE}; the number has dimension ${n.dimension.toString()}`)
      }
      return quantityValue(right.unit.toQuantity(n.value))
    }
    if (node.op === "/") {
      return scalar(unwrap(right.unit.convert(left.quantity), node.span, messageOf))
    }
  }
  if (left._tag === "LambdaUnit" || right._tag === "LambdaUnit") {
    return fail(node.span, "LambdaUnitMisuse", LAMBDA_USAGE)
  }
  return evaluateQuantities(
    node,
    expectQuantity(left, node.left.span, `Left operand of ${node.op}`),
    expectQuantity(right, node.right.span, `Right operand of ${node.op}`),
  )
}

const evaluateCall = (node: CallNode, ctx: EvalContext): Value => {
  const callee = resolveName(node.name, node.span, ctx)
  if (callee._tag === "Closure") {
    checkArity(node, node.args, 1, 1)
    const [arg] = node.args
    return arg ? callClosure(callee, evaluate(arg, ctx)) : fail(node.span, "ArityMismatch", "Missing argument")
  }
  if (callee._tag !== "Builtin") {
    return fail(node.span, "UnsupportedFunction", `"${node.name}" is ${describeValue[callee._tag]}, not a function`)
  }
  const args = node.args.map((arg) => evaluate(arg, ctx))
  return callee.call(args, node)
}

const evaluate = (expr: Expr, ctx: EvalContext): Value => {
  switch (expr._tag) {
    case "NumberLiteral":
      return scalar(expr.value, literalExact(expr.text))
    case "StringLiteral":
      return { _tag: "Text", value: expr.value }
    case "BooleanLiteral":
      return { _tag: "Flag", value: expr.value }
    case "Ref":
      return resolveName(expr.name, expr.span, ctx)
    case "Unary": {
      const operand = evaluate(expr.expr, ctx)
      if (operand._tag === "LambdaUnit") {
        return fail(expr.span, "LambdaUnitMisuse", LAMBDA_USAGE)
      }
      const value = expectQuantity(operand, expr.expr.span, "Operand of unary sign")
      return expr.op === "Pos"
        ? value
        : { _tag: "Quantity", quantity: value.quantity.negate(), exact: Option.map(value.exact, (r) => r.neg()) }
    }
    case "Binary":
      return evaluateBinary(expr, ctx)
    case "Call":
      return evaluateCall(expr, ctx)
    case "Lambda":
      return { _tag: "Closure", node: expr, scope: ctx.scope.snapshot(), locals: ctx.locals }
  }
}

/**
 * Evaluate `expr` against `scope`. Failures are thrown as
 * `DiagnosticError`s in the `evaluate` phase.
 */
export const evaluateExpression = (expr: Expr, scope: Scope): Value =>
  evaluate(expr, { scope, locals: new Map() })

export const valueKind = (value: Value): string => describeValue[value._tag]
