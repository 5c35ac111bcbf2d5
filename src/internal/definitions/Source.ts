import { Option } from "effect"

/**
 * One statement line of a definition source, with its note split off and
 * the enclosing `[section]` attached.
 */
export interface SourceLine {
  readonly source: string
  readonly line: number
  /** Statement text up to the note, columns unchanged. */
  readonly text: string
  readonly section: Option.Option<string>
  readonly note: Option.Option<string>
}

const SECTION = /^\s*\[(.*)\]\s*$/

/**
 * Index of the first `;` that is not inside a quoted string, or -1.
 */
const noteStart = (text: string): number => {
  let quote: string | undefined
  for (let index = 0; index < text.length; index++) {
    const char = text[index]
    if (quote) {
      if (char === quote) {
        quote = undefined
      }
    } else if (char === "'" || char === '"') {
      quote = char
    } else if (char === ";") {
      return index
    }
  }
  return -1
}

/**
 * Split a definition source into statement lines. Blank lines, comment
 * lines (`#` or `;` first) and section headers yield nothing.
 */
export const splitSource = (source: string, text: string): ReadonlyArray<SourceLine> => {
  const lines: Array<SourceLine> = []
  let section = Option.none<string>()
  text.split("\n").forEach((raw, index) => {
    const content = raw.endsWith("\r") ? raw.slice(0, -1) : raw
    const trimmed = content.trim()
    if (trimmed === "" || trimmed.startsWith("#") || trimmed.startsWith(";")) {
      return
    }
    const header = SECTION.exec(content)
    if (header) {
      section = Option.some((header[1] ?? "").trim())
      return
    }
    const split = noteStart(content)
    const note = split < 0 ? Option.none<string>() : Option.some(content.slice(split + 1).trim())
    lines.push({
      source,
      line: index + 1,
      text: (split < 0 ? content : content.slice(0, split)).trimEnd(),
      section,
      note: Option.filter(note, (value) => value !== ""),
    })
  })
  return lines
}
