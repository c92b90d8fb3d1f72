/**
 * Terminal column widths. CJK and most emoji take two columns, combining
 * marks and control characters none.
 */
export function stringWidth(text: string): number {
  let width = 0
  for (const ch of text) {
    width += wcwidth(ch.codePointAt(0) ?? 0)
  }
  return width
}

/** Longest prefix of whole code points that fits in `width` columns. */
export function truncateToWidth(text: string, width: number): string {
  if (width <= 0) return ""
  let out = ""
  let used = 0
  for (const ch of text) {
    const charWidth = wcwidth(ch.codePointAt(0) ?? 0)
    if (used + charWidth > width) break
    out += ch
    used += charWidth
  }
  return out
}

export function wcwidth(codePoint: number): number {
  if (codePoint >= 0x20 && codePoint < 0x7f) return 1
  if (codePoint < 0x20 || (codePoint >= 0x7f && codePoint < 0xa0)) return 0
  if (isInRanges(codePoint, COMBINING_RANGES)) return 0
  if (isInRanges(codePoint, WIDE_RANGES) || isInRanges(codePoint, EMOJI_RANGES)) return 2
  return 1
}

function isInRanges(codePoint: number, ranges: readonly (readonly [number, number])[]): boolean {
  return ranges.some(([start, end]) => codePoint >= start && codePoint <= end)
}

const COMBINING_RANGES = [
  [0x0300, 0x036f],
  [0x1ab0, 0x1aff],
  [0x1dc0, 0x1dff],
  [0x200b, 0x200f],
  [0x20d0, 0x20ff],
  [0xfe00, 0xfe0f],
  [0xfe20, 0xfe2f]
] as const

// Hangul jamo, CJK, Hangul syllables, fullwidth forms.
const WIDE_RANGES = [
  [0x1100, 0x115f],
  [0x2329, 0x232a],
  [0x2e80, 0xa4cf],
  [0xac00, 0xd7a3],
  [0xf900, 0xfaff],
  [0xfe10, 0xfe19],
  [0xfe30, 0xfe6f],
  [0xff00, 0xff60],
  [0xffe0, 0xffe6],
  [0x20000, 0x2fffd],
  [0x30000, 0x3fffd]
] as const

const EMOJI_RANGES = [
  [0x1f300, 0x1f64f],
  [0x1f680, 0x1f6ff],
  [0x1f900, 0x1faff]
] as const
