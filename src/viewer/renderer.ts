import { describeFilter, matchesFilter } from "../logcat/filter.ts"
import { ansi } from "../ui/terminal.ts"
import { color, formatLogRecord, sanitizeForTerminal, truncateText } from "../ui/log-format.ts"

import type { FilterState } from "../logcat/filter.ts"
import type { LogRecord } from "../logcat/record.ts"
import type { RingBuffer } from "../logcat/ring-buffer.ts"
import type { ViewState } from "./view-state.ts"

export interface TerminalWriter {
  write(text: string): void
  readonly columns: number
  readonly rows: number
}

export const HELP_LINES = [
  "Keys",
  "",
  "  q        quit",
  "  space    pause / resume the live view",
  "  p        toggle the package filter",
  "  P        set the package name (enables the package filter)",
  "  t        set the tag filter (empty clears)",
  "  l        set the level filter: E, W+, I+, VDI (empty clears)",
  "  /        set the text filter (empty clears)",
  "  c        clear all filters except package",
  "  C        clear every filter, including package",
  "  ?        toggle this help",
  "",
  'Wrap a tag or text value in double quotes ("MyTag") for an exact match.',
  "In a prompt: Enter applies, Esc cancels."
] as const

export interface RendererOptions {
  readonly out: TerminalWriter
  readonly buffer: RingBuffer<LogRecord>
  readonly filter: FilterState
  readonly view: ViewState
  readonly color: boolean
  readonly title?: string
  /** Defers a flush; the default waits for `setImmediate` so bursts coalesce. */
  readonly schedule?: (flush: () => void) => void
}

type PendingPaint = {
  full: boolean
  status: boolean
  appended: LogRecord[]
}

/**
 * Paints the filtered view: a log area on every row but the last, and a
 * status/prompt line at the bottom.
 *
 * Paint requests are queued and flushed together. A pending full render
 * replaces any pending incremental lines, so whatever is skipped the next
 * flush still shows exactly what the current filter selects.
 */
export class Renderer {
  private readonly opts: RendererOptions
  private readonly schedule: (flush: () => void) => void
  private pending: PendingPaint = { full: false, status: false, appended: [] }
  private scheduled = false
  private closed = false
  private window: LogRecord[] = []
  /** Seqs of buffered records that pass the filter, oldest first. */
  private matchedSeqs: number[] = []

  public constructor(opts: RendererOptions) {
    this.opts = opts
    this.schedule = opts.schedule ?? (flush => setImmediate(flush))
  }

  /** Records currently on screen, oldest first. */
  public get visible(): readonly LogRecord[] {
    return this.window
  }

  private get logRows(): number {
    return Math.max(1, this.opts.out.rows - 1)
  }

  /** New records from the tailer; only those passing the filter are queued. */
  public append(records: readonly LogRecord[]): void {
    const { view, filter } = this.opts
    const passing = records.filter(record => matchesFilter(filter, record))
    for (const record of passing) this.matchedSeqs.push(record.seq)
    if (view.paused || view.helpVisible) {
      this.requestStatus()
      return
    }
    if (this.pending.full) {
      this.requestStatus()
      return
    }
    this.pending.appended.push(...passing)
    this.pending.status = true
    this.requestFlush()
  }

  /** Re-derive the view by replaying the buffer through the current filter. */
  public requestFullRender(): void {
    this.pending = { full: true, status: true, appended: [] }
    this.requestFlush()
  }

  public requestStatus(): void {
    this.pending.status = true
    this.requestFlush()
  }

  /** Drops queued and future paints; the terminal is being handed back. */
  public close(): void {
    this.closed = true
    this.pending = { full: false, status: false, appended: [] }
  }

  public flush(): void {
    this.scheduled = false
    if (this.closed) return
    const pending = this.pending
    this.pending = { full: false, status: false, appended: [] }

    if (pending.full || pending.appended.length >= this.logRows) {
      this.paintFull()
      return
    }
    if (pending.appended.length > 0) this.paintAppended(pending.appended)
    if (pending.status || pending.appended.length > 0) this.paintStatus()
  }

  /** Replays a buffer snapshot; returns the passing records in order. */
  public replay(): LogRecord[] {
    const out: LogRecord[] = []
    for (const record of this.opts.buffer.snapshot()) {
      if (matchesFilter(this.opts.filter, record)) out.push(record)
    }
    return out
  }

  private requestFlush(): void {
    if (this.scheduled) return
    this.scheduled = true
    this.schedule(() => this.flush())
  }

  private paintFull(): void {
    const { out, view } = this.opts
    const rows = this.logRows
    const frame: string[] = [ansi.clearScreen, ansi.home]

    if (view.helpVisible) {
      HELP_LINES.slice(0, rows).forEach((line, i) => {
        frame.push(ansi.moveTo(i + 1, 1), truncateText(line, out.columns))
      })
    } else {
      const matched = this.replay()
      this.matchedSeqs = matched.map(record => record.seq)
      this.window = matched.slice(-rows)
      const firstRow = rows - this.window.length + 1
      this.window.forEach((record, i) => {
        frame.push(ansi.moveTo(firstRow + i, 1), this.formatLine(record))
      })
    }

    out.write(frame.join(""))
    this.paintStatus()
  }

  private paintAppended(records: readonly LogRecord[]): void {
    const rows = this.logRows
    this.window = [...this.window, ...records].slice(-rows)

    // Scroll only the log area; the status line stays put.
    const parts: string[] = [`\x1b[1;${rows}r`]
    for (const record of records) {
      parts.push(ansi.moveTo(rows, 1), "\n", "\r", ansi.clearLine, this.formatLine(record))
    }
    parts.push("\x1b[r")
    this.opts.out.write(parts.join(""))
  }

  private paintStatus(): void {
    const { out } = this.opts
    out.write(`${ansi.moveTo(out.rows, 1)}${ansi.clearLine}${this.statusLine()}`)
  }

  public statusLine(): string {
    const { view, filter, buffer, out } = this.opts
    const width = out.columns

    if (view.prompt) {
      const text = truncateText(`${view.prompt.label}: ${sanitizeForTerminal(view.prompt.value)}`, width)
      return this.opts.color ? `${text}${color(" ", "inverse")}` : text
    }

    const parts = [
      this.opts.title ?? "logq",
      describeState(view),
      describeFilter(filter),
      `${this.matchedInBuffer()}/${buffer.size}`
    ]
    if (view.paused) parts.push("PAUSED")
    if (view.notice) parts.push(view.notice.text)
    parts.push("? help")

    const text = truncateText(parts.join(" · "), width)
    if (!this.opts.color) return text
    if (view.notice?.kind === "error") return color(text, "red")
    return color(text, "inverse")
  }

  /** Forgets matches the buffer has evicted since they were counted. */
  private matchedInBuffer(): number {
    const oldestSeq = this.opts.buffer.oldest()?.seq
    if (oldestSeq === undefined) {
      this.matchedSeqs = []
      return 0
    }
    let evicted = 0
    while (evicted < this.matchedSeqs.length && (this.matchedSeqs[evicted] ?? oldestSeq) < oldestSeq) {
      evicted += 1
    }
    if (evicted > 0) this.matchedSeqs.splice(0, evicted)
    return this.matchedSeqs.length
  }

  private formatLine(record: LogRecord): string {
    return formatLogRecord({ record, color: this.opts.color, width: this.opts.out.columns })
  }
}

function describeState(view: ViewState): string {
  const { state, reason } = view.status
  if (state === "error") return reason ? `frozen (${reason})` : "frozen"
  if (state === "rotated") return "reopening"
  return state
}
