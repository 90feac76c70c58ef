export type NormalizeOptions = {
  stripNulls?: boolean // default true
  joinHyphenatedBreaks?: boolean // default true
  collapseSpaces?: boolean // default true
  maxBlankLines?: number // default 1 (paragraph break preserved)
}

const BLANK_LINE_LIMIT_DEFAULT = 1

export function normalizeText(input: string, opts?: NormalizeOptions): string {
  let s = String(input ?? '')

  if (opts?.stripNulls ?? true) {
    s = s.replace(/\u0000+/g, '')
  }

  s = s.replace(/\r\n?/g, '\n')

  // Only join "word-\nword" where both sides are plainly words; "state-\nof" stays.
  if (opts?.joinHyphenatedBreaks ?? true) {
    s = s.replace(/(\p{L}{2,})-\n(\p{L}{3,})/gu, '$1$2')
  }

  if (opts?.collapseSpaces ?? true) {
    s = s.replace(/[\t ]+/g, ' ').replace(/ *\n */g, '\n')
  }

  const blankLines = opts?.maxBlankLines ?? BLANK_LINE_LIMIT_DEFAULT
  if (Number.isInteger(blankLines) && blankLines >= 0) {
    const limit = new RegExp(`\\n{${blankLines + 2},}`, 'g')
    s = s.replace(limit, '\n'.repeat(blankLines + 1))
  }

  return s
}
