import { appendFile, mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { PassThrough } from "node:stream"
import { afterEach, expect, test } from "vitest"

import { ansi } from "../src/ui/terminal.ts"
import { runViewer } from "../src/viewer/session.ts"

import type { ViewerConfig } from "../src/lib/config.ts"
import type { ViewerOutput } from "../src/viewer/session.ts"

let tempDir: string | null = null

afterEach(async () => {
  if (tempDir) {
    await rm(tempDir, { recursive: true, force: true })
    tempDir = null
  }
})

class FakeTtyInput extends PassThrough {
  public isTTY = true
  public readonly rawModes: boolean[] = []

  public setRawMode(mode: boolean): this {
    this.rawModes.push(mode)
    return this
  }
}

class FakeTtyOutput implements ViewerOutput {
  public readonly isTTY = true
  public readonly columns = 120
  public readonly rows = 8
  public readonly chunks: string[] = []
  public readonly resizeListeners = new Set<() => void>()

  public write(text: string): boolean {
    this.chunks.push(text)
    return true
  }

  public on(_event: "resize", listener: () => void): this {
    this.resizeListeners.add(listener)
    return this
  }

  public off(_event: "resize", listener: () => void): this {
    this.resizeListeners.delete(listener)
    return this
  }

  public get text(): string {
    return this.chunks.join("")
  }
}

async function createConfig(content: string): Promise<ViewerConfig> {
  tempDir = await mkdtemp(join(tmpdir(), "logq-session-"))
  const logFile = join(tempDir, "device.log")
  await writeFile(logFile, content)
  return {
    logFile,
    projectRoot: tempDir,
    packageName: null,
    packageFilterEnabled: false,
    tagFilter: null,
    levelFilter: null,
    textFilter: null,
    replay: "tail",
    capacity: 100,
    pollIntervalMs: 10,
    seedBytes: 4096,
    producerPid: null,
    debugLogPath: null
  }
}

test("q restores the terminal, stops following and resolves 0", async () => {
  const config = await createConfig("01-01 00:00:00.000  100  100 I App: hello from app\n")
  const input = new FakeTtyInput()
  const output = new FakeTtyOutput()
  const sigtermListeners = process.listenerCount("SIGTERM")

  const running = runViewer(config, { input, output })

  await expect.poll(() => input.listenerCount("keypress"), { timeout: 2_000 }).toBe(1)
  await expect.poll(() => output.text, { timeout: 2_000 }).toContain("hello from app")
  expect(input.rawModes).toEqual([true])
  expect(output.resizeListeners.size).toBe(1)

  input.emit("keypress", "q", { name: "q", sequence: "q" })

  await expect(running).resolves.toBe(0)
  expect(input.rawModes).toEqual([true, false])
  expect(input.listenerCount("keypress")).toBe(0)
  expect(output.resizeListeners.size).toBe(0)
  expect(process.listenerCount("SIGTERM")).toBe(sigtermListeners)
  expect(output.chunks[output.chunks.length - 1]).toBe(`\x1b[r${ansi.showCursor}${ansi.altScreenOff}`)

  // The tailer no longer polls: new lines after quitting are never painted.
  const writesAtExit = output.chunks.length
  await appendFile(config.logFile, "01-01 00:00:01.000  100  100 I App: after quit\n")
  await new Promise(resolve => setTimeout(resolve, 60))
  expect(output.chunks.length).toBe(writesAtExit)
})

test("a missing log file returns 1 without touching the terminal", async () => {
  const config = await createConfig("")
  const input = new FakeTtyInput()
  const output = new FakeTtyOutput()

  const code = await runViewer({ ...config, logFile: join(config.projectRoot, "missing.log") }, { input, output })

  expect(code).toBe(1)
  expect(input.rawModes).toEqual([])
  expect(output.chunks).toEqual([])
})

test("without a TTY the viewer refuses to start", async () => {
  const config = await createConfig("")
  const input = new FakeTtyInput()
  input.isTTY = false
  const output = new FakeTtyOutput()

  await expect(runViewer(config, { input, output })).resolves.toBe(1)
  expect(input.rawModes).toEqual([])
  expect(output.chunks).toEqual([])
})
