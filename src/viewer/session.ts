import { basename } from "node:path"
import { emitKeypressEvents } from "node:readline"

import { isTtyStream } from "../lib/os.ts"
import { createFilterState } from "../logcat/filter.ts"
import { PackagePidTracker, learnPackagePids } from "../logcat/package-pids.ts"
import { RingBuffer } from "../logcat/ring-buffer.ts"
import { logger } from "../ui/logger.ts"
import { ansi, isColorEnabled } from "../ui/terminal.ts"
import { InteractiveController } from "./controller.ts"
import { createFileLogger, silentLogger } from "./debug-logger.ts"
import { Renderer } from "./renderer.ts"
import { Tailer, TailerOpenError } from "./tailer.ts"
import { createViewState } from "./view-state.ts"

import type { ViewerConfig } from "../lib/config.ts"
import type { LogRecord } from "../logcat/record.ts"
import type { KeyInput } from "./controller.ts"
import type { TerminalWriter } from "./renderer.ts"

export interface ViewerInput extends NodeJS.ReadableStream {
  readonly isTTY?: boolean
  setRawMode(mode: boolean): unknown
}

export interface ViewerOutput {
  readonly isTTY?: boolean
  readonly columns: number
  readonly rows: number
  write(text: string): unknown
  on(event: "resize", listener: () => void): unknown
  off(event: "resize", listener: () => void): unknown
}

export interface ViewerTerminal {
  readonly input: ViewerInput
  readonly output: ViewerOutput
}

/**
 * Interactive viewer over `config.logFile`. Resolves with the process exit
 * code: 0 after `q`, 1 when the file cannot be opened or there is no TTY.
 */
export async function runViewer(
  config: ViewerConfig,
  terminal: ViewerTerminal = { input: process.stdin, output: process.stdout }
): Promise<number> {
  const { input, output } = terminal
  if (!isTtyStream(input) || !isTtyStream(output)) {
    logger.error({ message: "The viewer needs an interactive terminal. Use `logq print` to dump a log." })
    return 1
  }

  const debugLogger = config.debugLogPath ? createFileLogger({ logPath: config.debugLogPath }) : silentLogger
  const buffer = new RingBuffer<LogRecord>(config.capacity)
  const pids = new PackagePidTracker()
  const filter = createFilterState({
    packageName: config.packageName,
    packageFilterEnabled: config.packageFilterEnabled,
    tagFilter: config.tagFilter,
    levelFilter: config.levelFilter,
    textFilter: config.textFilter
  })
  const view = createViewState()

  const out: TerminalWriter = {
    write: text => {
      output.write(text)
    },
    get columns() {
      return output.columns > 0 ? output.columns : 80
    },
    get rows() {
      return output.rows > 0 ? output.rows : 24
    }
  }

  const renderer = new Renderer({
    out,
    buffer,
    filter,
    view,
    color: isColorEnabled(),
    title: basename(config.logFile)
  })

  const tailer = new Tailer({
    path: config.logFile,
    buffer,
    pollIntervalMs: config.pollIntervalMs,
    seedBytes: config.seedBytes,
    replay: config.replay,
    producerPid: config.producerPid,
    logger: debugLogger,
    onRecords: records => {
      if (learnPackagePids({ records, pids, filter })) renderer.requestFullRender()
      else renderer.append(records)
    },
    onStatus: status => {
      view.status = status
      renderer.requestStatus()
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

  learnPackagePids({ records: buffer.snapshot(), pids, filter })
  debugLogger.info({ message: "viewer started", fields: { file: config.logFile, buffered: buffer.size } })

  return await new Promise<number>((resolvePromise, rejectPromise) => {
    const finish = () => {
      input.off("keypress", onKeypress)
      output.off("resize", onResize)
      process.off("SIGTERM", onSigterm)
      renderer.close()
      restoreTerminal(terminal)
      tailer
        .stop()
        .then(() => resolvePromise(0))
        .catch((error: unknown) => rejectPromise(error))
    }

    const controller = new InteractiveController({
      filter,
      view,
      renderer,
      onQuit: finish,
      onPackageChange: packageName => {
        filter.packagePids = pids.pidsFor(packageName)
      }
    })

    const onKeypress = (_text: string | undefined, key: KeyInput | undefined) => {
      controller.handleKey(key ?? {})
    }
    const onResize = () => renderer.requestFullRender()
    const onSigterm = () => controller.handleKey({ name: "c", ctrl: true })

    setupTerminal(terminal)
    input.on("keypress", onKeypress)
    output.on("resize", onResize)
    process.on("SIGTERM", onSigterm)

    renderer.requestFullRender()
    tailer.resume()
  })
}

function setupTerminal({ input, output }: ViewerTerminal): void {
  emitKeypressEvents(input)
  input.setRawMode(true)
  input.resume()
  output.write(`${ansi.altScreenOn}${ansi.hideCursor}`)
}

function restoreTerminal({ input, output }: ViewerTerminal): void {
  output.write(`\x1b[r${ansi.showCursor}${ansi.altScreenOff}`)
  input.setRawMode(false)
  input.pause()
}
