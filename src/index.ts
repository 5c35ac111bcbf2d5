/**
 * @since 0.1.0
 */
export * from "./Errors.js"
export * from "./Exponents.js"
export * from "./Quantity.js"
export * from "./LambdaUnit.js"
export * from "./SymbolEntry.js"
export * from "./Prefixes.js"
export * from "./SymbolTable.js"
export * from "./Definitions.js"
export * from "./Simplifier.js"
export * from "./Format.js"
export * from "./UnitSystem.js"
