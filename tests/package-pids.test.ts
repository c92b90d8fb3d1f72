import { expect, test } from "vitest"

import { createFilterState } from "../src/logcat/filter.ts"
import { PackagePidTracker, learnPackagePids, parseProcessEvent } from "../src/logcat/package-pids.ts"
import { parseLogLine } from "../src/logcat/parser.ts"

function am(message: string, seq = 1) {
  return parseLogLine(`01-01 00:00:00.000   500   520 I ActivityManager: ${message}`, seq)
}

test("reads process start, death and kill lines", () => {
  expect(parseProcessEvent(am("Start proc 4321:com.example.app/u0a123 for activity"))).toEqual({
    type: "start",
    pid: 4321,
    processName: "com.example.app"
  })
  expect(parseProcessEvent(am("Process com.example.app:remote (pid 4400) has died: fg"))).toEqual({
    type: "death",
    pid: 4400,
    processName: "com.example.app:remote"
  })
  expect(parseProcessEvent(am("Killing 4321:com.example.app/u0a123 (adj 900): empty"))).toEqual({
    type: "death",
    pid: 4321,
    processName: "com.example.app"
  })
})

test("ignores lines from other tags", () => {
  const record = parseLogLine("01-01 00:00:00.000   500   520 I Other: Start proc 1:com.x/u0", 1)
  expect(parseProcessEvent(record)).toBeNull()
})

test("collects pids for a package and its sub-processes", () => {
  const tracker = new PackagePidTracker()
  expect(tracker.observe(am("Start proc 4321:com.example.app/u0a123 for activity"))).not.toBeNull()
  expect(tracker.observe(am("Start proc 4321:com.example.app/u0a123 for activity"))).toBeNull()
  tracker.observe(am("Start proc 4400:com.example.app:remote/u0a123 for service"))
  tracker.observe(am("Start proc 5000:com.example.application/u0a9 for service"))

  expect([...tracker.pidsFor("com.example.app")].sort()).toEqual([4321, 4400])
  expect(tracker.pidsFor(null).size).toBe(0)
})

test("learnPackagePids updates the filter only for the current package", () => {
  const tracker = new PackagePidTracker()
  const filter = createFilterState({ packageName: "com.example.app" })

  const unrelated = learnPackagePids({
    records: [am("Start proc 77:com.other/u0a1 for activity")],
    pids: tracker,
    filter
  })
  expect(unrelated).toBe(false)
  expect(filter.packagePids.size).toBe(0)

  const related = learnPackagePids({
    records: [am("Start proc 4321:com.example.app/u0a123 for activity")],
    pids: tracker,
    filter
  })
  expect(related).toBe(true)
  expect([...filter.packagePids]).toEqual([4321])
})
