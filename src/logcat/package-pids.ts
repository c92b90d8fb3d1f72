import type { FilterState } from "./filter.ts"
import type { LogRecord } from "./record.ts"

const START_PROC_PATTERN = /\bStart proc (\d+):([A-Za-z0-9_.:]+)\//
const PROCESS_DIED_PATTERN = /\bProcess ([A-Za-z0-9_.:]+) \(pid (\d+)\) has died/
const KILLING_PATTERN = /\bKilling (\d+):([A-Za-z0-9_.:]+)\//

export type ProcessEvent =
  | { readonly type: "start"; readonly pid: number; readonly processName: string }
  | { readonly type: "death"; readonly pid: number; readonly processName: string }

/**
 * Reads ActivityManager process lifecycle lines ("Start proc", "has died",
 * "Killing").
 */
export function parseProcessEvent(record: LogRecord): ProcessEvent | null {
  if (record.status !== "ok" || record.tag !== "ActivityManager") return null

  const start = record.message.match(START_PROC_PATTERN)
  if (start) {
    return { type: "start", pid: Number.parseInt(start[1] ?? "", 10), processName: start[2] ?? "" }
  }

  const died = record.message.match(PROCESS_DIED_PATTERN)
  if (died) {
    return { type: "death", pid: Number.parseInt(died[2] ?? "", 10), processName: died[1] ?? "" }
  }

  const killed = record.message.match(KILLING_PATTERN)
  if (killed) {
    return { type: "death", pid: Number.parseInt(killed[1] ?? "", 10), processName: killed[2] ?? "" }
  }

  return null
}

/**
 * Maps process names to the pids the device reported for them, so the package
 * filter can match app lines whose tag never mentions the package.
 *
 * Dead pids are kept: their lines are still in the history and should stay
 * visible under the package filter.
 */
export class PackagePidTracker {
  private readonly pidsByProcess = new Map<string, Set<number>>()

  /** Returns the event when the record taught the tracker a new pid. */
  public observe(record: LogRecord): ProcessEvent | null {
    const event = parseProcessEvent(record)
    if (!event || !Number.isSafeInteger(event.pid) || event.processName.length === 0) return null

    const known = this.pidsByProcess.get(event.processName) ?? new Set<number>()
    if (known.has(event.pid)) return null
    known.add(event.pid)
    this.pidsByProcess.set(event.processName, known)
    return event
  }

  /** Pids of `packageName` and of its `packageName:suffix` sub-processes. */
  public pidsFor(packageName: string | null): ReadonlySet<number> {
    const out = new Set<number>()
    if (!packageName) return out
    for (const [processName, pids] of this.pidsByProcess) {
      if (!isProcessOfPackage(processName, packageName)) continue
      for (const pid of pids) out.add(pid)
    }
    return out
  }
}

export function isProcessOfPackage(processName: string, packageName: string): boolean {
  return processName === packageName || processName.startsWith(`${packageName}:`)
}

/**
 * Feeds process start/death lines to the tracker. Returns true when the set
 * of pids for the current package grew, which changes what the package
 * filter selects for records already on screen.
 */
export function learnPackagePids(opts: {
  readonly records: Iterable<LogRecord>
  readonly pids: PackagePidTracker
  readonly filter: FilterState
}): boolean {
  const { records, pids, filter } = opts
  let changed = false
  for (const record of records) {
    const event = pids.observe(record)
    if (!event || !filter.packageName) continue
    if (isProcessOfPackage(event.processName, filter.packageName)) changed = true
  }
  if (changed) filter.packagePids = pids.pidsFor(filter.packageName)
  return changed
}
