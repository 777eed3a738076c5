import type { IToken, TokenType } from "chevrotain"
import { UnknownUnitError } from "../../Errors.js"
import type { UnitTable } from "../../UnitTable.js"
import { isKnownSymbol } from "../../UnitTable.js"
import { Caret, Exponent, UnitStringLexer, UnitSymbol, WhiteSpace } from "./tokens.js"

/**
 * One whitespace-separated term of a unit string, before prefix splitting.
 */
export interface RawTerm {
  readonly symbol: string
  readonly power: number
  readonly hasExponent: boolean
}

/**
 * A term split into a multiplier prefix (`""` when absent) and a known unit
 * symbol.
 */
export interface UnitTerm extends RawTerm {
  readonly multiplier: string
  readonly base: string
}

class TermStream {
  readonly #tokens: ReadonlyArray<IToken>
  readonly #source: string
  #index = 0

  constructor(tokens: ReadonlyArray<IToken>, source: string) {
    this.#tokens = tokens
    this.#source = source
  }

  peek(): IToken | undefined {
    return this.#tokens[this.#index]
  }

  match(tokenType: TokenType): IToken | undefined {
    const token = this.peek()
    if (token && token.tokenType === tokenType) {
      this.#index += 1
      return token
    }
    return undefined
  }

  done(): boolean {
    return this.#index >= this.#tokens.length
  }

  // The offending term is the whitespace-delimited chunk around `token`.
  error(token: IToken | undefined): UnknownUnitError {
    if (!token) {
      return new UnknownUnitError({ symbol: this.#source.trim() })
    }
    return new UnknownUnitError({ symbol: chunkAt(this.#source, token.startOffset) })
  }
}

const chunkAt = (source: string, offset: number): string => {
  let start = offset
  while (start > 0 && !/\s/.test(source.charAt(start - 1))) {
    start -= 1
  }
  let end = offset
  while (end < source.length && !/\s/.test(source.charAt(end))) {
    end += 1
  }
  return source.slice(start, end)
}

const parseTerm = (stream: TermStream): RawTerm => {
  const symbol = stream.match(UnitSymbol)
  if (!symbol) {
    throw stream.error(stream.peek())
  }
  if (!stream.match(Caret)) {
    return { symbol: symbol.image, power: 1, hasExponent: false }
  }
  const exponent = stream.match(Exponent)
  const power = exponent ? Number(exponent.image) : Number.NaN
  if (!Number.isFinite(power)) {
    throw stream.error(symbol)
  }
  return { symbol: symbol.image, power, hasExponent: true }
}

/**
 * Split a unit string into `symbol[^exponent]` terms. No table lookups are
 * made, so unknown symbols pass through.
 */
export const tokenizeUnitString = (units: string): ReadonlyArray<RawTerm> => {
  const lexed = UnitStringLexer.tokenize(units)
  const [lexError] = lexed.errors
  if (lexError) {
    throw new UnknownUnitError({ symbol: chunkAt(units, lexError.offset) })
  }
  const stream = new TermStream(lexed.tokens, units)
  const terms: Array<RawTerm> = []
  stream.match(WhiteSpace)
  while (!stream.done()) {
    terms.push(parseTerm(stream))
    if (!stream.done() && !stream.match(WhiteSpace)) {
      throw stream.error(stream.peek())
    }
  }
  return terms
}

/**
 * Resolve a term symbol against the table. An exact symbol never takes a
 * prefix; otherwise prefixes are tried in table order and the first whose
 * remainder is a known symbol wins.
 */
export const splitSymbol = (
  table: UnitTable,
  symbol: string,
): { readonly multiplier: string; readonly base: string } => {
  if (isKnownSymbol(table, symbol)) {
    return { multiplier: "", base: symbol }
  }
  for (const candidate of table.multipliers) {
    if (symbol.length > candidate.symbol.length && symbol.startsWith(candidate.symbol)) {
      const base = symbol.slice(candidate.symbol.length)
      if (isKnownSymbol(table, base)) {
        return { multiplier: candidate.symbol, base }
      }
    }
  }
  throw new UnknownUnitError({ symbol })
}

/**
 * Tokenize a unit string and split every term into prefix and unit.
 */
export const parseUnitString = (table: UnitTable, units: string): ReadonlyArray<UnitTerm> =>
  tokenizeUnitString(units).map((term) => ({ ...term, ...splitSymbol(table, term.symbol) }))

/**
 * Parse a single `symbol[^exponent]` token.
 *
 * @example
 * ```ts
 * parseUnitTerm(table, "km^2") // => { multiplier: "k", base: "m", power: 2, ... }
 * ```
 */
export const parseUnitTerm = (table: UnitTable, token: string): UnitTerm => {
  const [term, ...rest] = parseUnitString(table, token)
  if (!term || rest.length > 0) {
    throw new UnknownUnitError({ symbol: token.trim() })
  }
  return term
}
