import { expect, test } from "vitest"

import {
  FilterInputError,
  clearFilters,
  createFilterState,
  describeFilter,
  matchesFilter,
  parseLevelFilter,
  parseTextMatcher
} from "../src/logcat/filter.ts"
import { parseLogLine } from "../src/logcat/parser.ts"

import type { LogRecord } from "../src/logcat/record.ts"

let seq = 0
function line(opts: {
  readonly level: string
  readonly tag: string
  readonly message: string
  readonly pid?: number
}): LogRecord {
  seq += 1
  const pid = String(opts.pid ?? 100).padStart(5)
  return parseLogLine(`01-01 00:00:00.000 ${pid}   101 ${opts.level} ${opts.tag}: ${opts.message}`, seq)
}

const unparsed = parseLogLine("--------- beginning of crash", 0)

test("W+ keeps warnings and above", () => {
  const filter = createFilterState({ levelFilter: parseLevelFilter("W+") })
  const kept = ["V", "D", "I", "W", "E", "F"].filter(level =>
    matchesFilter(filter, line({ level, tag: "T", message: "m" }))
  )
  expect(kept).toEqual(["W", "E", "F"])
  expect(matchesFilter(filter, unparsed)).toBe(false)
})

test("a letter set matches exactly those levels", () => {
  const filter = createFilterState({ levelFilter: parseLevelFilter("vdi") })
  expect(matchesFilter(filter, line({ level: "D", tag: "T", message: "m" }))).toBe(true)
  expect(matchesFilter(filter, line({ level: "W", tag: "T", message: "m" }))).toBe(false)
})

test("? selects unparsed lines", () => {
  const filter = createFilterState({ levelFilter: parseLevelFilter("?") })
  expect(matchesFilter(filter, unparsed)).toBe(true)
  expect(matchesFilter(filter, line({ level: "E", tag: "T", message: "m" }))).toBe(false)
})

test("level parsing", () => {
  expect(parseLevelFilter("")).toBeNull()
  expect(parseLevelFilter("  ")).toBeNull()
  expect(parseLevelFilter("w+")).toEqual({ mode: "atLeast", min: "W" })
  expect(parseLevelFilter("A")).toEqual({ mode: "set", levels: new Set(["F"]) })
  expect(() => parseLevelFilter("Z")).toThrow(FilterInputError)
  expect(() => parseLevelFilter("Z")).toThrow('Invalid level filter "Z" (try W, E, I+ or VDI)')
  expect(() => parseLevelFilter("WE+")).toThrow(FilterInputError)
})

test("quoted tag values match exactly, bare ones as substrings", () => {
  expect(parseTextMatcher('"MyTag"')).toEqual({ mode: "exact", value: "MyTag" })
  expect(parseTextMatcher("My")).toEqual({ mode: "substring", value: "My" })
  expect(parseTextMatcher("")).toBeNull()

  const exact = createFilterState({ tagFilter: parseTextMatcher('"MyTag"') })
  expect(matchesFilter(exact, line({ level: "I", tag: "MyTag", message: "m" }))).toBe(true)
  expect(matchesFilter(exact, line({ level: "I", tag: "MyTag2", message: "m" }))).toBe(false)

  const substring = createFilterState({ tagFilter: parseTextMatcher("Tag") })
  expect(matchesFilter(substring, line({ level: "I", tag: "MyTag2", message: "m" }))).toBe(true)
})

test("filters compose with AND", () => {
  const filter = createFilterState({
    levelFilter: parseLevelFilter("E"),
    textFilter: parseTextMatcher("boom")
  })
  expect(matchesFilter(filter, line({ level: "E", tag: "App", message: "boom!" }))).toBe(true)
  expect(matchesFilter(filter, line({ level: "E", tag: "App", message: "fine" }))).toBe(false)
  expect(matchesFilter(filter, line({ level: "I", tag: "App", message: "boom!" }))).toBe(false)
})

test("evaluating the same records twice gives the same answer", () => {
  const filter = createFilterState({ levelFilter: parseLevelFilter("I+") })
  const records = [
    line({ level: "D", tag: "A", message: "1" }),
    line({ level: "I", tag: "B", message: "2" }),
    line({ level: "E", tag: "C", message: "3" })
  ]
  const first = records.filter(r => matchesFilter(filter, r)).map(r => r.seq)
  const second = records.filter(r => matchesFilter(filter, r)).map(r => r.seq)
  expect(second).toEqual(first)
  expect(first.length).toBe(2)
})

test("package filter matches known pids or the name in tag or message", () => {
  const filter = createFilterState({
    packageName: "com.example.app",
    packagePids: new Set([4321])
  })
  expect(filter.packageFilterEnabled).toBe(true)
  expect(matchesFilter(filter, line({ level: "I", tag: "Any", message: "x", pid: 4321 }))).toBe(true)
  expect(
    matchesFilter(filter, line({ level: "I", tag: "PM", message: "installed com.example.app", pid: 9 }))
  ).toBe(true)
  expect(matchesFilter(filter, line({ level: "I", tag: "Other", message: "x", pid: 9 }))).toBe(false)
})

test("package filter without a package name constrains nothing", () => {
  const filter = createFilterState({ packageFilterEnabled: true })
  expect(filter.packageName).toBeNull()
  expect(matchesFilter(filter, line({ level: "I", tag: "Other", message: "x", pid: 9 }))).toBe(true)
})

test("clear keeps the package filter unless asked", () => {
  const filter = createFilterState({
    packageName: "com.example.app",
    tagFilter: parseTextMatcher("Net"),
    levelFilter: parseLevelFilter("E"),
    textFilter: parseTextMatcher("x")
  })

  clearFilters(filter, { includePackage: false })
  expect(filter.tagFilter).toBeNull()
  expect(filter.levelFilter).toBeNull()
  expect(filter.textFilter).toBeNull()
  expect(filter.packageFilterEnabled).toBe(true)

  clearFilters(filter, { includePackage: true })
  expect(filter.packageFilterEnabled).toBe(false)
  expect(filter.packageName).toBe("com.example.app")
})

test("describeFilter", () => {
  expect(describeFilter(createFilterState())).toBe("no filters")
  const filter = createFilterState({
    packageName: "com.example.app",
    levelFilter: parseLevelFilter("W+"),
    tagFilter: parseTextMatcher('"Net"'),
    textFilter: parseTextMatcher("timeout")
  })
  expect(describeFilter(filter)).toBe('pkg:com.example.app level:W+ tag:"Net" text:timeout')
})
