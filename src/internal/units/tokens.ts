import { createToken, Lexer } from "chevrotain"

export const WhiteSpace = createToken({ name: "WhiteSpace", pattern: /\s+/ })
export const UnitSymbol = createToken({ name: "UnitSymbol", pattern: /[A-Za-z_]+/ })
export const Caret = createToken({ name: "Caret", pattern: /\^/ })
export const Exponent = createToken({
  name: "Exponent",
  pattern: /[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/,
})

export const unitTokens = [WhiteSpace, UnitSymbol, Caret, Exponent]

export const UnitStringLexer = new Lexer(unitTokens, { positionTracking: "onlyOffset" })
