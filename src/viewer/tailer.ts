import { open, stat } from "node:fs/promises"

import {
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_SEED_BYTES,
  READ_CHUNK_BYTES,
  REWRITE_CHECK_BYTES
} from "../constants.ts"
import { isErrnoException, isProcessRunning } from "../lib/os.ts"
import { parseLogLine } from "../logcat/parser.ts"
import { LineSplitter } from "../ui/lines.ts"
import { silentLogger } from "./debug-logger.ts"

import type { FileHandle } from "node:fs/promises"
import type { LogRecord } from "../logcat/record.ts"
import type { RingBuffer } from "../logcat/ring-buffer.ts"
import type { Logger } from "../ui/logger.ts"

export type TailerState = "opening" | "following" | "rotated" | "error" | "stopped"

export interface TailerStatus {
  readonly state: TailerState
  readonly reason?: string
}

/** `tail` seeds the buffer from the end of the existing file; `none` starts at EOF. */
export type TailerReplay = "tail" | "none"

export interface TailerOptions {
  readonly path: string
  readonly buffer: RingBuffer<LogRecord>
  readonly pollIntervalMs?: number
  readonly seedBytes?: number
  readonly replay?: TailerReplay
  /** Pid of the process writing the file; when it exits the tailer stops following. */
  readonly producerPid?: number | null
  readonly isProducerAlive?: (pid: number) => boolean
  readonly onRecords?: (records: readonly LogRecord[]) => void
  readonly onStatus?: (status: TailerStatus) => void
  readonly logger?: Logger
}

export class TailerOpenError extends Error {
  public readonly path: string

  public constructor(opts: { readonly path: string; readonly cause: unknown }) {
    const detail =
      isErrnoException(opts.cause) && opts.cause.code === "ENOENT" ? "file not found"
      : opts.cause instanceof Error ? opts.cause.message
      : "unknown error"
    super(`Cannot open log file ${opts.path}: ${detail}`, { cause: opts.cause })
    this.name = "TailerOpenError"
    this.path = opts.path
  }
}

type FileIdentity = {
  readonly dev: number
  readonly ino: number
}

/**
 * Follows a log file that another process appends to.
 *
 * opening → following ⇄ rotated, with error and stopped as terminal states.
 * Every complete line becomes a record in the ring buffer regardless of any
 * filter; new records are handed to `onRecords` once per poll.
 */
export class Tailer {
  private readonly opts: TailerOptions
  private readonly pollIntervalMs: number
  private readonly logger: Logger
  private readonly splitter = new LineSplitter()

  private currentState: TailerState = "opening"
  private handle: FileHandle | null = null
  private identity: FileIdentity | null = null
  private position = 0
  /** Last bytes read before `position`; a rewrite in place changes them. */
  private consumedTail: Buffer = Buffer.alloc(0)
  private nextSeq = 1
  private timer: ReturnType<typeof setTimeout> | null = null
  private inFlight: Promise<void> | null = null

  public constructor(opts: TailerOptions) {
    this.opts = opts
    this.pollIntervalMs = Math.max(10, opts.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS)
    this.logger = opts.logger ?? silentLogger
  }

  public get state(): TailerState {
    return this.currentState
  }

  /**
   * Opens the file and seeds the buffer. Throws `TailerOpenError` when the file
   * cannot be opened; that is the only fatal failure.
   */
  public async start(opts?: { readonly poll?: boolean }): Promise<void> {
    if (this.currentState !== "opening") {
      throw new Error(`Tailer already started (state: ${this.currentState})`)
    }

    try {
      await this.openFile()
    } catch (error: unknown) {
      this.setState({ state: "error", reason: "open failed" })
      throw new TailerOpenError({ path: this.opts.path, cause: error })
    }

    const replay = this.opts.replay ?? "tail"
    if (replay === "tail") {
      await this.seedFromTail()
    } else {
      this.position = await this.currentSize()
      await this.captureConsumedTail()
    }

    this.setState({ state: "following" })
    if (opts?.poll !== false) this.schedulePoll()
  }

  /** Starts the poll timer after `start({ poll: false })`. */
  public resume(): void {
    if (this.timer || this.currentState !== "following") return
    this.schedulePoll()
  }

  /**
   * One poll tick. The timer calls this; tests drive it directly.
   */
  public async pollOnce(): Promise<void> {
    if (this.inFlight) {
      await this.inFlight
      return
    }

    const run = this.poll()
    this.inFlight = run
    try {
      await run
    } finally {
      this.inFlight = null
    }
  }

  public async stop(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }
    const wasTerminal = this.currentState === "stopped"
    this.currentState = "stopped"
    if (this.inFlight) await this.inFlight
    await this.closeHandle()
    if (!wasTerminal) this.opts.onStatus?.({ state: "stopped" })
  }

  private schedulePoll(): void {
    if (this.currentState === "stopped" || this.currentState === "error") return
    this.timer = setTimeout(() => {
      this.timer = null
      void this.pollOnce()
        .catch((error: unknown) => this.fail(error instanceof Error ? error.message : String(error)))
        .catch((error: unknown) => this.logger.error({ message: `tailer failure: ${String(error)}` }))
        .finally(() => this.schedulePoll())
    }, this.pollIntervalMs)
  }

  private async poll(): Promise<void> {
    if (this.currentState === "rotated") {
      await this.reopenAfterRotation()
      return
    }
    if (this.currentState !== "following") return

    let identity: FileIdentity
    let size: number
    try {
      const st = await stat(this.opts.path)
      identity = { dev: st.dev, ino: st.ino }
      size = st.size
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        // Give the writer one poll interval to recreate the file.
        await this.markRotated("file removed")
        return
      }
      throw error
    }

    if (this.identity && (identity.dev !== this.identity.dev || identity.ino !== this.identity.ino)) {
      await this.markRotated("file replaced")
      await this.reopenAfterRotation()
      return
    }

    if (size < this.position) {
      await this.markRotated("file truncated")
      await this.reopenAfterRotation()
      return
    }

    // Truncated and refilled past the read position between two polls.
    if (!(await this.isConsumedTailIntact())) {
      await this.markRotated("file rewritten")
      await this.reopenAfterRotation()
      return
    }

    if (size > this.position) {
      this.deliver(await this.readToEnd())
    }

    await this.checkProducer()
  }

  private async checkProducer(): Promise<void> {
    const pid = this.opts.producerPid
    if (pid === undefined || pid === null) return
    const alive = this.opts.isProducerAlive ?? ((p: number) => isProcessRunning({ pid: p }))
    if (alive(pid)) return

    // Drain whatever the producer wrote before exiting, including an unterminated last line.
    const drained = await this.readToEnd()
    const rest = this.splitter.flush()
    if (rest !== null) drained.push(this.appendLine(rest))
    this.deliver(drained)
    await this.fail(`log producer (pid ${pid}) exited`)
  }

  private async markRotated(reason: string): Promise<void> {
    this.logger.info({ message: "log file rotated", fields: { reason, path: this.opts.path } })
    await this.closeHandle()
    this.splitter.reset()
    this.consumedTail = Buffer.alloc(0)
    this.setState({ state: "rotated", reason })
  }

  /** Exactly one reopen attempt per detected rotation. */
  private async reopenAfterRotation(): Promise<void> {
    try {
      await this.openFile()
    } catch (error: unknown) {
      const detail = isErrnoException(error) && error.code === "ENOENT" ? "file not found" : "reopen failed"
      await this.fail(`log file unavailable after rotation (${detail})`)
      return
    }

    this.position = 0
    this.setState({ state: "following" })
    this.deliver(await this.readToEnd())
  }

  private async fail(reason: string): Promise<void> {
    if (this.currentState === "stopped" || this.currentState === "error") return
    this.logger.warn({ message: "tailer stopped following", fields: { reason } })
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }
    await this.closeHandle()
    this.setState({ state: "error", reason })
  }

  private async openFile(): Promise<void> {
    const handle = await open(this.opts.path, "r")
    try {
      const st = await handle.stat()
      this.identity = { dev: st.dev, ino: st.ino }
    } catch (error: unknown) {
      await handle.close()
      throw error
    }
    this.handle = handle
  }

  private async closeHandle(): Promise<void> {
    const handle = this.handle
    this.handle = null
    if (handle) await handle.close()
  }

  private async currentSize(): Promise<number> {
    if (!this.handle) return 0
    const st = await this.handle.stat()
    return st.size
  }

  private async seedFromTail(): Promise<void> {
    const size = await this.currentSize()
    const seedBytes = Math.max(0, this.opts.seedBytes ?? DEFAULT_SEED_BYTES)
    const start = Math.max(0, size - seedBytes)

    // Starting mid-file: begin one byte early and drop everything up to the
    // first newline, so the first kept line is always a whole one.
    this.position = start > 0 ? start - 1 : 0
    const lines = await this.readLines()
    const kept = start > 0 ? lines.slice(1) : lines
    for (const line of kept) this.appendLine(line)
    this.logger.debug({ message: "seeded buffer", fields: { lines: kept.length, from: start } })
  }

  private async readToEnd(): Promise<LogRecord[]> {
    const lines = await this.readLines()
    return lines.map(line => this.appendLine(line))
  }

  private async readLines(): Promise<string[]> {
    const handle = this.handle
    if (!handle) return []

    const lines: string[] = []
    const chunk = Buffer.alloc(READ_CHUNK_BYTES)
    while (true) {
      const { bytesRead } = await handle.read(chunk, 0, chunk.length, this.position)
      if (bytesRead === 0) break
      this.position += bytesRead
      this.rememberConsumed(chunk.subarray(0, bytesRead))
      lines.push(...this.splitter.push(chunk.subarray(0, bytesRead)))
    }
    return lines
  }

  private rememberConsumed(bytes: Buffer): void {
    const joined = Buffer.concat([this.consumedTail, bytes])
    this.consumedTail = joined.subarray(Math.max(0, joined.length - REWRITE_CHECK_BYTES))
  }

  private async captureConsumedTail(): Promise<void> {
    const handle = this.handle
    const length = Math.min(REWRITE_CHECK_BYTES, this.position)
    if (!handle || length === 0) return
    const bytes = Buffer.alloc(length)
    const { bytesRead } = await handle.read(bytes, 0, length, this.position - length)
    this.consumedTail = bytes.subarray(0, bytesRead)
  }

  private async isConsumedTailIntact(): Promise<boolean> {
    const handle = this.handle
    const expected = this.consumedTail
    if (!handle || expected.length === 0) return true
    const current = Buffer.alloc(expected.length)
    const { bytesRead } = await handle.read(current, 0, expected.length, this.position - expected.length)
    return bytesRead === expected.length && current.equals(expected)
  }

  private appendLine(line: string): LogRecord {
    const record = parseLogLine(line, this.nextSeq)
    this.nextSeq += 1
    this.opts.buffer.append(record)
    return record
  }

  private deliver(records: readonly LogRecord[]): void {
    if (records.length === 0 || this.currentState === "stopped") return
    this.opts.onRecords?.(records)
  }

  private setState(status: TailerStatus): void {
    if (this.currentState === "stopped") return
    this.currentState = status.state
    this.opts.onStatus?.(status)
  }
}
