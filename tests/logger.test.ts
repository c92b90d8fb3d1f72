import { expect, test } from "vitest"

import { createLogger, formatFieldsInline } from "../src/ui/logger.ts"

function createSink(): { write: (text: string) => void; lines: string[] } {
  const lines: string[] = []
  return { write: text => lines.push(text), lines }
}

test("console backend writes level, message and sorted fields", () => {
  const stderr = createSink()
  const logger = createLogger({ backend: "console", debug: false, stderr })

  logger.warn({ message: "config ignored", fields: { path: "/p/.logq/config.json", code: 2 } })
  logger.error({ message: "cannot open" })

  expect(stderr.lines).toEqual([
    "WARN: config ignored (code=2, path=/p/.logq/config.json)\n",
    "ERROR: cannot open\n"
  ])
})

test("debug lines are dropped unless enabled", () => {
  const quiet = createSink()
  createLogger({ backend: "console", debug: false, stderr: quiet }).debug({ message: "hidden" })
  expect(quiet.lines).toEqual([])

  const verbose = createSink()
  createLogger({ backend: "console", debug: true, stderr: verbose }).debug({ message: "shown" })
  expect(verbose.lines).toEqual(["DEBUG: shown\n"])
})

test("formatFieldsInline", () => {
  expect(formatFieldsInline(undefined)).toBe("")
  expect(formatFieldsInline({})).toBe("")
  expect(formatFieldsInline({ b: true, a: "x" })).toBe(" (a=x, b=true)")
})
