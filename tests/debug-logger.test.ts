import { mkdtemp, readFile, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, expect, test } from "vitest"

import { createFileLogger } from "../src/viewer/debug-logger.ts"

let tempDir: string | null = null

afterEach(async () => {
  if (tempDir) {
    await rm(tempDir, { recursive: true, force: true })
    tempDir = null
  }
})

async function readLines(path: string): Promise<string[]> {
  try {
    return (await readFile(path, "utf8")).split("\n").filter(line => line.length > 0)
  } catch {
    return []
  }
}

test("file logger appends one line per call in order", async () => {
  tempDir = await mkdtemp(join(tmpdir(), "logq-debug-"))
  const logPath = join(tempDir, "viewer.log")
  const logger = createFileLogger({ logPath })

  logger.info({ message: "viewer started", fields: { file: "a.log", buffered: 3 } })
  logger.warn({ message: "tailer stopped following" })

  await expect.poll(() => readLines(logPath), { timeout: 2_000 }).toHaveLength(2)
  const lines = await readLines(logPath)
  expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] INFO viewer started \(buffered=3, file=a\.log\)$/)
  expect(lines[1]).toMatch(/^\[[^\]]+\] WARN tailer stopped following$/)
})
