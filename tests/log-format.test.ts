import { expect, test } from "vitest"

import { parseLogLine } from "../src/logcat/parser.ts"
import { formatLogRecord, sanitizeForTerminal, truncateText } from "../src/ui/log-format.ts"
import { stringWidth } from "../src/ui/text-width.ts"

function stripAnsi(text: string): string {
  return text.replaceAll(/\u001b\[[0-9;]*m/g, "")
}

test("plain format lines up pid and tid columns", () => {
  const record = parseLogLine("01-01 00:00:00.000  100  100 I MyTag: hello", 1)
  expect(formatLogRecord({ record, color: false })).toBe("01-01 00:00:00.000   100   100 I MyTag: hello")
})

test("width truncates the visible text", () => {
  const record = parseLogLine("01-01 00:00:00.000  100  100 I MyTag: hello", 1)
  expect(formatLogRecord({ record, color: false, width: 20 })).toBe("01-01 00:00:00.000  ")
})

test("color only changes escape codes, not the text", () => {
  const record = parseLogLine("01-01 00:00:00.000  100  100 E Crash: boom", 1)
  const out = formatLogRecord({ record, color: true })
  expect(out).toContain("\u001b[31mE\u001b[0m")
  expect(out).toContain("\u001b[31mboom\u001b[0m")
  expect(stripAnsi(out)).toBe("01-01 00:00:00.000   100   100 E Crash: boom")
})

test("info messages keep the default color", () => {
  const record = parseLogLine("01-01 00:00:00.000  100  100 I App: fine", 1)
  const out = formatLogRecord({ record, color: true })
  expect(out.endsWith(": fine")).toBe(true)
})

test("unparsed records print their raw text without control characters", () => {
  const record = parseLogLine("plain\ttext\u0007 here\u001b[2J", 1)
  expect(formatLogRecord({ record, color: true })).toBe("plain    text here[2J")
})

test("sanitize and truncate helpers", () => {
  expect(sanitizeForTerminal("a\tb\rc")).toBe("a    bc")
  expect(truncateText("abcdef", 3)).toBe("abc")
  expect(truncateText("abc", 0)).toBe("")
})

test("width counts terminal columns for wide characters", () => {
  const record = parseLogLine(`01-01 00:00:00.000  100  100 I T: ${"日本語".repeat(20)}`, 1)
  const out = formatLogRecord({ record, color: false, width: 60 })
  expect(out).toBe(`01-01 00:00:00.000   100   100 I T: ${"日本語".repeat(4)}`)
  expect(stringWidth(out)).toBe(60)
})

test("truncation never splits a surrogate pair", () => {
  const record = parseLogLine("x😀", 1)
  expect(formatLogRecord({ record, color: false, width: 2 })).toBe("x")
  expect(formatLogRecord({ record, color: false, width: 3 })).toBe("x😀")
})
