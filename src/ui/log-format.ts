import { stringWidth, truncateToWidth } from "./text-width.ts"

import type { LogRecord, RecordLevel } from "../logcat/record.ts"

type AnsiStyle = "dim" | "bold" | "red" | "boldRed" | "green" | "yellow" | "cyan" | "inverse"

type Segment = {
  readonly text: string
  readonly style?: AnsiStyle | { readonly hashed: string }
}

/**
 * One display line for a record: `MM-DD HH:MM:SS.mmm  pid  tid L tag: message`.
 * Unparsed records are shown as their raw text. `width` truncates the visible
 * text to that many terminal columns (escape codes are not counted).
 */
export function formatLogRecord(opts: {
  readonly record: LogRecord
  readonly color: boolean
  readonly width?: number
}): string {
  const segments = recordSegments(opts.record)
  const fitted = opts.width === undefined ? segments : truncateSegments(segments, opts.width)
  return fitted.map(s => (opts.color ? paint(s) : s.text)).join("")
}

export function levelStyle(level: RecordLevel): AnsiStyle | null {
  return (
    {
      V: "dim",
      D: "cyan",
      I: "green",
      W: "yellow",
      E: "red",
      F: "boldRed",
      "?": null
    } satisfies Record<RecordLevel, AnsiStyle | null>
  )[level]
}

export function color(text: string, kind: AnsiStyle): string {
  const code =
    kind === "dim" ? "\x1b[2m"
    : kind === "bold" ? "\x1b[1m"
    : kind === "red" ? "\x1b[31m"
    : kind === "boldRed" ? "\x1b[1m\x1b[31m"
    : kind === "green" ? "\x1b[32m"
    : kind === "yellow" ? "\x1b[33m"
    : kind === "inverse" ? "\x1b[7m"
    : "\x1b[36m"
  return `${code}${text}\x1b[0m`
}

export function truncateText(text: string, width: number): string {
  return truncateToWidth(text, width)
}

/**
 * Tabs become spaces and other control characters are dropped, so a log line
 * cannot move the cursor or change terminal modes.
 */
export function sanitizeForTerminal(text: string): string {
  return text.replaceAll("\t", "    ").replaceAll(/[\x00-\x08\x0a-\x1f\x7f]/g, "")
}

function recordSegments(record: LogRecord): Segment[] {
  if (record.status === "unparsed") {
    return [{ text: sanitizeForTerminal(record.raw) }]
  }

  const style = levelStyle(record.level)
  const head = `${record.timestamp} ${String(record.pid).padStart(5)} ${String(record.tid).padStart(5)} `
  const tagStyle = record.tag.length > 0 ? { hashed: record.tag } : undefined
  return [
    { text: head, style: "dim" },
    style ? { text: record.level, style } : { text: record.level },
    { text: " " },
    tagStyle ? { text: sanitizeForTerminal(record.tag), style: tagStyle } : { text: "" },
    { text: ": " },
    style === "red" || style === "boldRed" || style === "yellow" ?
      { text: sanitizeForTerminal(record.message), style }
    : { text: sanitizeForTerminal(record.message) }
  ]
}

function truncateSegments(segments: readonly Segment[], width: number): Segment[] {
  const out: Segment[] = []
  let remaining = Math.max(0, width)
  for (const segment of segments) {
    if (remaining === 0) break
    const segmentWidth = stringWidth(segment.text)
    if (segmentWidth <= remaining) {
      out.push(segment)
      remaining -= segmentWidth
      continue
    }
    out.push({ ...segment, text: truncateToWidth(segment.text, remaining) })
    remaining = 0
  }
  return out
}

function paint(segment: Segment): string {
  if (!segment.style || segment.text.length === 0) return segment.text
  if (typeof segment.style === "string") return color(segment.text, segment.style)
  return colorHashed(segment.text, segment.style.hashed)
}

function colorHashed(text: string, key: string): string {
  const palette = [
    33, 39, 45, 69, 75, 81, 87, 93, 99, 105, 111, 141, 147, 153, 159, 165, 171, 177, 183, 189
  ] as const
  const idx = fnv1a32(key) % palette.length
  const code = palette[idx] ?? 39
  return `\x1b[38;5;${code}m${text}\x1b[0m`
}

function fnv1a32(text: string): number {
  let hash = 0x811c9dc5
  for (let i = 0; i < text.length; i += 1) {
    hash ^= text.charCodeAt(i)
    hash = Math.imul(hash, 0x01000193)
  }
  // Force unsigned 32-bit
  return hash >>> 0
}
