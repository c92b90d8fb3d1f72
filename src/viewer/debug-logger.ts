import { appendFile } from "node:fs/promises"

import { formatFieldsInline } from "../ui/logger.ts"

import type { LogInput, LogLevel, Logger } from "../ui/logger.ts"

/**
 * Logger that appends to a file. The viewer owns the terminal while it runs,
 * so its diagnostics go here (enabled with LOGQ_DEBUG_LOG=<path>).
 */
export function createFileLogger({ logPath }: { readonly logPath: string }): Logger {
  let queue = Promise.resolve()

  const writeLine = ({ level, input }: { readonly level: LogLevel; readonly input: LogInput }) => {
    const timestamp = new Date().toISOString()
    const line = `[${timestamp}] ${level.toUpperCase()} ${input.message}${formatFieldsInline(input.fields)}\n`
    queue = queue.then(() => appendFile(logPath, line)).catch(() => undefined)
  }

  return {
    debug: input => writeLine({ level: "debug", input }),
    info: input => writeLine({ level: "info", input }),
    warn: input => writeLine({ level: "warn", input }),
    error: input => writeLine({ level: "error", input }),
    success: input => writeLine({ level: "success", input }),
    step: input => writeLine({ level: "step", input })
  }
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  success: () => undefined,
  step: () => undefined
}
