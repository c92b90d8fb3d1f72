export const LOG_LEVELS = ["V", "D", "I", "W", "E", "F"] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

/** `?` marks a line whose level could not be read. */
export type RecordLevel = LogLevel | "?"

interface LogRecordBase {
  readonly seq: number
  readonly raw: string
  readonly level: RecordLevel
  readonly tag: string
  readonly message: string
}

export interface ParsedLogRecord extends LogRecordBase {
  readonly status: "ok"
  readonly timestamp: string
  readonly pid: number
  readonly tid: number
  readonly level: LogLevel
}

export interface UnparsedLogRecord extends LogRecordBase {
  readonly status: "unparsed"
  readonly level: "?"
  readonly tag: ""
}

export type LogRecord = ParsedLogRecord | UnparsedLogRecord

export function levelRank(level: RecordLevel): number {
  return level === "?" ? -1 : LOG_LEVELS.indexOf(level)
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

export function isRecordLevel(value: string): value is RecordLevel {
  return value === "?" || isLogLevel(value)
}
