import { expect, test } from "vitest"

import { isErrnoException, isProcessRunning, isTtyStream } from "../src/lib/os.ts"
import { isTruthyEnv } from "../src/ui/terminal.ts"

test("the current process is running", () => {
  expect(isProcessRunning({ pid: process.pid })).toBe(true)
})

test("errno narrowing", () => {
  expect(isErrnoException(Object.assign(new Error("gone"), { code: "ENOENT" }))).toBe(true)
  expect(isErrnoException(new Error("plain"))).toBe(false)
  expect(isErrnoException({ code: "ENOENT" })).toBe(false)
})

test("tty detection", () => {
  expect(isTtyStream({ isTTY: true })).toBe(true)
  expect(isTtyStream({})).toBe(false)
})

test("truthy env values", () => {
  expect(["1", "true", " YES ", "on"].map(isTruthyEnv)).toEqual([true, true, true, true])
  expect(["", "0", "no", undefined].map(v => isTruthyEnv(v))).toEqual([false, false, false, false])
})
