import { log as clackLog } from "@clack/prompts"

import { isTruthyEnv } from "./terminal.ts"

export type LogLevel = "debug" | "info" | "warn" | "error" | "success" | "step"

export type LogFieldValue = string | number | boolean
export type LogFields = Readonly<Record<string, LogFieldValue>>

export interface LogInput {
  readonly message: string
  readonly fields?: LogFields
}

export interface Logger {
  debug(input: LogInput): void
  info(input: LogInput): void
  warn(input: LogInput): void
  error(input: LogInput): void
  success(input: LogInput): void
  step(input: LogInput): void
}

export type LoggerBackend = "clack" | "console"

export interface LoggerOptions {
  /** Chosen on every call when omitted: LOGQ_LOGGER, else clack on a TTY. */
  readonly backend?: LoggerBackend
  /** Defaults to LOGQ_DEBUG. */
  readonly debug?: boolean
  /** Sink for the console backend. */
  readonly stderr?: { write(text: string): unknown }
}

export function formatFieldsInline(fields: LogFields | undefined): string {
  if (!fields) return ""
  const parts = Object.keys(fields)
    .sort()
    .map(key => `${key}=${String(fields[key])}`)
  return parts.length > 0 ? ` (${parts.join(", ")})` : ""
}

const clackWriters = {
  debug: text => clackLog.info(text),
  info: text => clackLog.info(text),
  warn: text => clackLog.warn(text),
  error: text => clackLog.error(text),
  success: text => clackLog.success(text),
  step: text => clackLog.step(text)
} satisfies Record<LogLevel, (text: string) => void>

export function createLogger(opts: LoggerOptions = {}): Logger {
  const emit = (level: LogLevel, { message, fields }: LogInput) => {
    const debugEnabled = opts.debug ?? isTruthyEnv(process.env.LOGQ_DEBUG)
    if (level === "debug" && !debugEnabled) return

    const line = `${message}${formatFieldsInline(fields)}`
    if ((opts.backend ?? resolveBackend()) === "clack") {
      clackWriters[level](line)
      return
    }
    const stderr = opts.stderr ?? process.stderr
    stderr.write(`${level.toUpperCase()}: ${line}\n`)
  }

  return {
    debug: input => emit("debug", input),
    info: input => emit("info", input),
    warn: input => emit("warn", input),
    error: input => emit("error", input),
    success: input => emit("success", input),
    step: input => emit("step", input)
  }
}

export const logger: Logger = createLogger()

function resolveBackend(): LoggerBackend {
  const raw = (process.env.LOGQ_LOGGER ?? "").trim().toLowerCase()
  if (raw === "console" || raw === "plain") return "console"
  if (raw === "clack") return "clack"
  // clack draws box characters meant for a terminal.
  return process.stderr.isTTY === true ? "clack" : "console"
}
