/**
 * A lexical token of the pattern language.
 * @public
 */
export type PatternToken =
  | StartAnchorToken
  | EndAnchorToken
  | LiteralToken
  | StrayAnchorToken
  | WildcardToken
  | QuantifierToken
  | DanglingEscapeToken

/**
 * Fields shared by every token.
 * @public
 */
export interface TokenBase {
  /** UTF-16 offset of the token's first character */
  readonly position: number

  /** Length in UTF-16 units, including any escaping backslash */
  readonly length: number
}

/**
 * `^` as the first character.
 * @public
 */
export interface StartAnchorToken extends TokenBase {
  readonly type: 'startAnchor'
}

/**
 * `$` as the last character.
 * @public
 */
export interface EndAnchorToken extends TokenBase {
  readonly type: 'endAnchor'
}

/**
 * A character matched as itself.
 * @public
 */
export interface LiteralToken extends TokenBase {
  readonly type: 'literal'
  readonly char: string
  /** Preceded by `\` */
  readonly escaped: boolean
}

/**
 * `$` anywhere but the end. Matches a literal `$` but cannot be quantified.
 * @public
 */
export interface StrayAnchorToken extends TokenBase {
  readonly type: 'strayAnchor'
  readonly char: '$'
}

/**
 * `.`
 * @public
 */
export interface WildcardToken extends TokenBase {
  readonly type: 'wildcard'
}

/**
 * Quantifier kinds.
 * @public
 */
export type QuantifierKind = '?' | '*' | '+'

/**
 * `?`, `*` or `+`.
 * @public
 */
export interface QuantifierToken extends TokenBase {
  readonly type: 'quantifier'
  readonly kind: QuantifierKind
}

/**
 * A trailing `\` with nothing after it.
 * @public
 */
export interface DanglingEscapeToken extends TokenBase {
  readonly type: 'danglingEscape'
}
