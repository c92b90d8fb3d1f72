import { createReadStream } from "node:fs"

import { createFilterState, matchesFilter } from "../logcat/filter.ts"
import { PackagePidTracker, learnPackagePids } from "../logcat/package-pids.ts"
import { parseLogLine } from "../logcat/parser.ts"
import { RingBuffer } from "../logcat/ring-buffer.ts"
import { Tailer, TailerOpenError } from "../viewer/tailer.ts"
import { formatLogRecord } from "./log-format.ts"
import { readLinesFromStream } from "./lines.ts"
import { logger } from "./logger.ts"

import type { ViewerConfig } from "../lib/config.ts"
import type { LogRecord } from "../logcat/record.ts"

export interface PrintSink {
  write(text: string): void
}

/**
 * Non-interactive counterpart of the viewer: prints the lines of a log file
 * that pass the filter. With `follow`, keeps printing until `signal` aborts
 * or the producer exits.
 */
export async function runLogPrint(opts: {
  readonly config: ViewerConfig
  readonly follow: boolean
  readonly color: boolean
  readonly out?: PrintSink
  readonly signal?: AbortSignal
}): Promise<number> {
  const { config } = opts
  const out = opts.out ?? process.stdout
  const filter = createFilterState({
    packageName: config.packageName,
    packageFilterEnabled: config.packageFilterEnabled,
    tagFilter: config.tagFilter,
    levelFilter: config.levelFilter,
    textFilter: config.textFilter
  })
  const pids = new PackagePidTracker()

  const emit = (records: Iterable<LogRecord>) => {
    const batch = [...records]
    learnPackagePids({ records: batch, pids, filter })
    const lines = batch
      .filter(record => matchesFilter(filter, record))
      .map(record => `${formatLogRecord({ record, color: opts.color })}\n`)
    if (lines.length > 0) out.write(lines.join(""))
  }

  if (!opts.follow) {
    return await printOnce({ path: config.logFile, emit })
  }
  return await printFollowing({ config, emit, ...(opts.signal ? { signal: opts.signal } : {}) })
}

async function printOnce(opts: {
  readonly path: string
  readonly emit: (records: Iterable<LogRecord>) => void
}): Promise<number> {
  const stream = createReadStream(opts.path)
  const opened = new Promise<void>((resolveOpen, rejectOpen) => {
    stream.once("open", () => resolveOpen())
    stream.once("error", rejectOpen)
  })
  try {
    await opened
  } catch (error: unknown) {
    stream.destroy()
    logger.error({ message: new TailerOpenError({ path: opts.path, cause: error }).message })
    return 1
  }

  let seq = 1
  let batch: LogRecord[] = []
  for await (const line of readLinesFromStream(stream)) {
    batch.push(parseLogLine(line, seq))
    seq += 1
    if (batch.length >= 500) {
      opts.emit(batch)
      batch = []
    }
  }
  opts.emit(batch)
  return 0
}

async function printFollowing(opts: {
  readonly config: ViewerConfig
  readonly emit: (records: Iterable<LogRecord>) => void
  readonly signal?: AbortSignal
}): Promise<number> {
  const { config } = opts
  const buffer = new RingBuffer<LogRecord>(config.capacity)

  let finish: () => void = () => undefined
  const done = new Promise<void>(resolveDone => {
    finish = resolveDone
  })

  const tailer = new Tailer({
    path: config.logFile,
    buffer,
    pollIntervalMs: config.pollIntervalMs,
    seedBytes: config.seedBytes,
    replay: config.replay,
    producerPid: config.producerPid,
    onRecords: records => opts.emit(records),
    onStatus: status => {
      if (status.state === "error") {
        logger.warn({ message: `Stopped following: ${status.reason ?? "unknown reason"}` })
        finish()
      }
    }
  })

  try {
    await tailer.start({ poll: false })
  } catch (error: unknown) {
    if (error instanceof TailerOpenError) {
      logger.error({ message: error.message })
      return 1
    }
    throw error
  }

  opts.emit(buffer.snapshot())

  const onAbort = () => finish()
  const onSignal = () => finish()
  opts.signal?.addEventListener("abort", onAbort, { once: true })
  if (opts.signal?.aborted) finish()
  process.once("SIGINT", onSignal)
  process.once("SIGTERM", onSignal)

  tailer.resume()
  await done

  opts.signal?.removeEventListener("abort", onAbort)
  process.off("SIGINT", onSignal)
  process.off("SIGTERM", onSignal)
  await tailer.stop()
  return 0
}
