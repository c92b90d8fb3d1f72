export function isTtyStream(stream: { readonly isTTY?: boolean }): boolean {
  return stream.isTTY === true
}

/**
 * Signal 0 probes for existence without delivering anything. EPERM means the
 * process exists but belongs to someone else.
 */
export function isProcessRunning({ pid }: { readonly pid: number }): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (error: unknown) {
    return isErrnoException(error) && error.code === "EPERM"
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string"
}
