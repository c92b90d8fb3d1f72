import { readFile, readdir, stat } from "node:fs/promises"
import { resolve } from "node:path"

export async function pathExists(absolutePath: string): Promise<boolean> {
  try {
    await stat(absolutePath)
    return true
  } catch {
    return false
  }
}

export async function readTextFile(absolutePath: string): Promise<string | null> {
  try {
    return await readFile(absolutePath, "utf8")
  } catch {
    return null
  }
}

export interface FileEntry {
  readonly path: string
  readonly mtimeMs: number
}

/** Regular files directly inside `absoluteDir`; an unreadable dir yields []. */
export async function listFiles(absoluteDir: string): Promise<FileEntry[]> {
  let names: string[]
  try {
    names = await readdir(absoluteDir)
  } catch {
    return []
  }

  const out: FileEntry[] = []
  for (const name of names) {
    const path = resolve(absoluteDir, name)
    try {
      const st = await stat(path)
      if (st.isFile()) out.push({ path, mtimeMs: st.mtimeMs })
    } catch {
      // removed between readdir and stat
    }
  }
  return out
}
