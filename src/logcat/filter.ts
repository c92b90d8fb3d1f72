import { LOG_LEVELS, isRecordLevel, levelRank } from "./record.ts"

import type { LogLevel, LogRecord, RecordLevel } from "./record.ts"

export type TextMatcher = {
  readonly mode: "substring" | "exact"
  readonly value: string
}

export type LevelFilter =
  | { readonly mode: "set"; readonly levels: ReadonlySet<RecordLevel> }
  | { readonly mode: "atLeast"; readonly min: LogLevel }

/**
 * Live filter configuration. The interactive controller is the only writer;
 * the tailer and renderer read it at evaluation time, so a change applies to
 * the next evaluation without any restart.
 */
export interface FilterState {
  packageFilterEnabled: boolean
  packageName: string | null
  packagePids: ReadonlySet<number>
  tagFilter: TextMatcher | null
  levelFilter: LevelFilter | null
  textFilter: TextMatcher | null
}

export class FilterInputError extends Error {
  public constructor(message: string) {
    super(message)
    this.name = "FilterInputError"
  }
}

export function createFilterState(init: Partial<FilterState> = {}): FilterState {
  const packageName = normalizePackageName(init.packageName ?? null)
  return {
    packageFilterEnabled: init.packageFilterEnabled ?? packageName !== null,
    packageName,
    packagePids: init.packagePids ?? new Set<number>(),
    tagFilter: init.tagFilter ?? null,
    levelFilter: init.levelFilter ?? null,
    textFilter: init.textFilter ?? null
  }
}

/**
 * AND of every configured filter, evaluated level → tag → package → text so
 * the message scan only runs for records that survived the cheaper checks.
 */
export function matchesFilter(state: FilterState, record: LogRecord): boolean {
  if (state.levelFilter && !matchesLevel(state.levelFilter, record.level)) return false
  if (state.tagFilter && !matchesText(state.tagFilter, record.tag)) return false
  if (!matchesPackage(state, record)) return false
  if (state.textFilter && !matchesText(state.textFilter, record.message)) return false
  return true
}

export function matchesLevel(filter: LevelFilter, level: RecordLevel): boolean {
  if (filter.mode === "set") return filter.levels.has(level)
  if (level === "?") return false
  return levelRank(level) >= levelRank(filter.min)
}

export function matchesText(matcher: TextMatcher, haystack: string): boolean {
  return matcher.mode === "exact" ? haystack === matcher.value : haystack.includes(matcher.value)
}

function matchesPackage(state: FilterState, record: LogRecord): boolean {
  if (!state.packageFilterEnabled) return true
  // Enabled without a name: no constraint, rather than hiding everything.
  const name = state.packageName
  if (!name) return true
  if (record.status === "ok" && state.packagePids.has(record.pid)) return true
  return record.tag.includes(name) || record.message.includes(name)
}

export function clearFilters(state: FilterState, opts: { readonly includePackage: boolean }): void {
  state.tagFilter = null
  state.levelFilter = null
  state.textFilter = null
  if (opts.includePackage) {
    state.packageFilterEnabled = false
  }
}

export function normalizePackageName(raw: string | null): string | null {
  const trimmed = (raw ?? "").trim()
  return trimmed.length > 0 ? trimmed : null
}

/**
 * Two explicit forms: `I+` (at-or-above) and a letter set such as `E` or
 * `VDI`. Letters are case-insensitive, `A` (assert) is read as `F` and `?`
 * selects unparsed lines. Empty input clears the filter.
 */
export function parseLevelFilter(input: string): LevelFilter | null {
  const raw = input.trim().toUpperCase()
  if (raw.length === 0) return null

  const atLeast = raw.match(/^([VDIWEFA])\+$/)
  if (atLeast) {
    return { mode: "atLeast", min: toLogLevel(atLeast[1] ?? "") }
  }

  if (!/^[VDIWEFA?]+$/.test(raw)) {
    throw new FilterInputError(`Invalid level filter "${input.trim()}" (try W, E, I+ or VDI)`)
  }

  const levels = new Set<RecordLevel>()
  for (const ch of raw) {
    const level = ch === "A" ? "F" : ch
    if (isRecordLevel(level)) levels.add(level)
  }
  return { mode: "set", levels }
}

export function parseTextMatcher(input: string): TextMatcher | null {
  const raw = input.trim()
  if (raw.length === 0) return null
  if (raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"')) {
    return { mode: "exact", value: raw.slice(1, -1) }
  }
  return { mode: "substring", value: raw }
}

export function formatLevelFilter(filter: LevelFilter | null): string {
  if (!filter) return ""
  if (filter.mode === "atLeast") return `${filter.min}+`
  const ordered: RecordLevel[] = [...LOG_LEVELS, "?"]
  return ordered.filter(level => filter.levels.has(level)).join("")
}

export function formatTextMatcher(matcher: TextMatcher | null): string {
  if (!matcher) return ""
  return matcher.mode === "exact" ? `"${matcher.value}"` : matcher.value
}

export function describeFilter(state: FilterState): string {
  const parts: string[] = []
  if (state.packageFilterEnabled && state.packageName) {
    parts.push(`pkg:${state.packageName}`)
  }
  if (state.levelFilter) parts.push(`level:${formatLevelFilter(state.levelFilter)}`)
  if (state.tagFilter) parts.push(`tag:${formatTextMatcher(state.tagFilter)}`)
  if (state.textFilter) parts.push(`text:${formatTextMatcher(state.textFilter)}`)
  return parts.length > 0 ? parts.join(" ") : "no filters"
}

function toLogLevel(letter: string): LogLevel {
  if (letter === "V" || letter === "D" || letter === "I" || letter === "W" || letter === "E") {
    return letter
  }
  return "F"
}
