import type { LogLevel, LogRecord } from "./record.ts"

// threadtime: "[YYYY-]MM-DD HH:MM:SS.mmm  <pid>  <tid> <L> <tag>: <message>"
const THREADTIME_PATTERN =
  /^(?:(\d{4})-)?(\d{2}-\d{2})\s+(\d{2}:\d{2}:\d{2}\.\d{3,9})\s+(\d+)\s+(\d+)\s+([VDIWEFA])\s(.*)$/

export function parseLogLine(raw: string, seq: number): LogRecord {
  const match = raw.match(THREADTIME_PATTERN)
  if (!match) return unparsedRecord(raw, seq)

  const year = match[1]
  const date = match[2] ?? ""
  const time = match[3] ?? ""
  const pid = Number.parseInt(match[4] ?? "", 10)
  const tid = Number.parseInt(match[5] ?? "", 10)
  const levelRaw = match[6] ?? ""
  const rest = match[7] ?? ""

  if (!Number.isSafeInteger(pid) || !Number.isSafeInteger(tid)) return unparsedRecord(raw, seq)

  const { tag, message } = splitTagAndMessage(rest)
  return {
    seq,
    raw,
    status: "ok",
    timestamp: year ? `${year}-${date} ${time}` : `${date} ${time}`,
    pid,
    tid,
    level: normalizeLevel(levelRaw),
    tag,
    message
  }
}

/**
 * Only the first ": " ends the tag; later occurrences belong to the message.
 * logcat pads short tags with spaces before the colon.
 */
export function splitTagAndMessage(rest: string): { readonly tag: string; readonly message: string } {
  const body = rest.trimStart()
  const idx = body.indexOf(": ")
  if (idx !== -1) {
    return { tag: body.slice(0, idx).trimEnd(), message: body.slice(idx + 2) }
  }
  if (body.endsWith(":")) {
    return { tag: body.slice(0, -1).trimEnd(), message: "" }
  }
  return { tag: "", message: body }
}

function normalizeLevel(raw: string): LogLevel {
  if (raw === "V" || raw === "D" || raw === "I" || raw === "W" || raw === "E") return raw
  // "A" (assert) and "F" share the top of the order.
  return "F"
}

function unparsedRecord(raw: string, seq: number): LogRecord {
  return { seq, raw, status: "unparsed", level: "?", tag: "", message: raw }
}
