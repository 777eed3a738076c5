/**
 * @since 0.1.0
 */
export * from "./Errors.js"
export * from "./Dimensions.js"
export * from "./UnitTable.js"
export * from "./UnitSystem.js"
export * from "./Unit.js"
export * from "./Quantity.js"
export * from "./UnitRegistry.js"
export { condense, divideUnitStrings, multiplyUnitStrings, powerUnitString, typeOf } from "./internal/units/algebra.js"
export { parseUnitString, parseUnitTerm, type RawTerm, type UnitTerm } from "./internal/units/parser.js"
export { resolveUnitString, type ResolvedUnit } from "./internal/units/resolver.js"
