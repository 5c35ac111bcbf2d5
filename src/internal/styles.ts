import type { Rational } from "./rational.js"
import { formatRational, isInteger } from "./rational.js"

export type FormatStyle = "plain" | "html" | "latex" | "unicode" | "modelica" | "verbose"

export const FORMAT_STYLES: ReadonlyArray<FormatStyle> = [
  "plain",
  "html",
  "latex",
  "unicode",
  "modelica",
  "verbose",
]

export const isFormatStyle = (value: string): value is FormatStyle =>
  FORMAT_STYLES.some((style) => style === value)

interface StyleRules {
  readonly multiply: string
  /** `undefined` when negative exponents are written instead of division. */
  readonly divide: string | undefined
  readonly group: (text: string) => string
  readonly base: (symbol: string) => string
  readonly exponent: (exponent: Rational) => string
  /** Between the number and the unit. */
  readonly times: string
  readonly scientific: (mantissa: string, exponent: string) => string
  readonly replacements: ReadonlyArray<readonly [RegExp, string]>
}

const SUPERSCRIPT_DIGITS = "⁰¹²³⁴⁵⁶⁷⁸⁹"

const toSuperscript = (text: string): string =>
  Array.from(text, (char) => {
    if (char === "-") {
      return "⁻"
    }
    const digit = SUPERSCRIPT_DIGITS[Number(char)]
    return char >= "0" && char <= "9" && digit ? digit : char
  }).join("")

const identity = (text: string): string => text

const parenthesized = (exponent: Rational): string =>
  isInteger(exponent) ? formatRational(exponent) : `(${formatRational(exponent)})`

const PLAIN: StyleRules = {
  multiply: "*",
  divide: "/",
  group: (text) => `(${text})`,
  base: identity,
  exponent: parenthesized,
  times: " ",
  scientific: (mantissa, exponent) => `${mantissa}e${exponent}`,
  replacements: [],
}

const STYLES: Readonly<Record<FormatStyle, StyleRules>> = {
  plain: PLAIN,
  html: {
    ...PLAIN,
    multiply: "&nbsp;",
    divide: undefined,
    exponent: (exponent) => `<sup>${formatRational(exponent)}</sup>`,
    times: "&nbsp;",
    scientific: (mantissa, exponent) => `${mantissa}&times;10<sup>${exponent}</sup>`,
  },
  latex: {
    ...PLAIN,
    multiply: "\\,",
    divide: undefined,
    group: (text) => `\\left(${text}\\right)`,
    base: (symbol) => `\\mathrm{${symbol}}`,
    exponent: (exponent) =>
      isInteger(exponent) && exponent.s > 0
        ? `^${formatRational(exponent)}`
        : `^{${formatRational(exponent)}}`,
    times: "\\,",
    scientific: (mantissa, exponent) => `${mantissa} \\times 10^{${exponent}}`,
    replacements: [
      [/deg/g, "^{\\circ}"],
      [/ohm/g, "\\Omega"],
      [/angstrom/g, "\\AA"],
    ],
  },
  unicode: {
    ...PLAIN,
    multiply: " ",
    divide: undefined,
    exponent: (exponent) =>
      isInteger(exponent) ? toSuperscript(formatRational(exponent)) : `^(${formatRational(exponent)})`,
    scientific: (mantissa, exponent) => `${mantissa}×10${toSuperscript(exponent)}`,
    replacements: [
      [/deg/g, "°"],
      [/ohm/g, "Ω"],
      [/angstrom/g, "Å"],
    ],
  },
  modelica: {
    ...PLAIN,
    multiply: ".",
  },
  verbose: {
    ...PLAIN,
    multiply: " * ",
    divide: " / ",
    exponent: (exponent) =>
      isInteger(exponent) ? `**${formatRational(exponent)}` : `**(${formatRational(exponent)})`,
  },
}

/**
 * Render ordered (symbol, exponent) pairs. With a division operator the
 * negative exponents move to a denominator, which is grouped when it holds
 * more than one factor; an empty numerator becomes `1`.
 */
export const renderFactors = (
  factors: ReadonlyArray<readonly [string, Rational]>,
  style: FormatStyle,
): string => {
  if (factors.length === 0) {
    return ""
  }
  const rules = STYLES[style]
  const numerator: Array<string> = []
  const denominator: Array<string> = []
  for (const [symbol, exponent] of factors) {
    const base = rules.base(symbol)
    const positive = exponent.s > 0
    const shown = rules.divide === undefined ? exponent : exponent.abs()
    const term = shown.equals(1) ? base : `${base}${rules.exponent(shown)}`
    if (positive || rules.divide === undefined) {
      numerator.push(term)
    } else {
      denominator.push(term)
    }
  }

  if (rules.divide === undefined || denominator.length === 0) {
    return applyReplacements(numerator.join(rules.multiply), rules)
  }
  const top = numerator.length > 0 ? numerator.join(rules.multiply) : "1"
  const bottom = denominator.join(rules.multiply)
  const text = `${top}${rules.divide}${denominator.length > 1 ? rules.group(bottom) : bottom}`
  return applyReplacements(text, rules)
}

const applyReplacements = (text: string, rules: StyleRules): string =>
  rules.replacements.reduce((current, [pattern, replacement]) => current.replace(pattern, replacement), text)

/**
 * Rewrite the `e` notation of a rendered number for the style. Exponent
 * signs `+` and leading zeros are dropped.
 */
export const renderScientific = (number: string, style: FormatStyle): string => {
  const match = /^([^eE]*)[eE]([+-]?)(\d+)$/.exec(number)
  if (!match) {
    return number
  }
  const [, mantissa = "", sign = "", digits = ""] = match
  const exponent = `${sign === "-" ? "-" : ""}${digits.replace(/^0+(?=\d)/, "")}`
  return STYLES[style].scientific(mantissa, exponent)
}

export const unitSeparator = (style: FormatStyle): string => STYLES[style].times
