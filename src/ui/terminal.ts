export function isTruthyEnv(value: string | undefined): boolean {
  const v = (value ?? "").trim().toLowerCase()
  return v === "1" || v === "true" || v === "yes" || v === "on"
}

export function isTty(): boolean {
  return process.stdout.isTTY === true
}

export function isColorEnabled(): boolean {
  if (!isTty()) return false
  if (process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== "") return false
  return !isTruthyEnv(process.env.LOGQ_NO_COLOR)
}

export const ansi = {
  reset: "\x1b[0m",
  clearScreen: "\x1b[2J",
  clearLine: "\x1b[2K",
  home: "\x1b[H",
  hideCursor: "\x1b[?25l",
  showCursor: "\x1b[?25h",
  altScreenOn: "\x1b[?1049h",
  altScreenOff: "\x1b[?1049l",
  moveTo: (row: number, col: number): string => `\x1b[${row};${col}H`
} as const
