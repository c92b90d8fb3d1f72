import { extname, isAbsolute, resolve } from "node:path"

import { listFiles, readTextFile } from "./fs.ts"
import { findUpAnyFile } from "./path.ts"
import {
  ANDROID_MANIFEST_PATH,
  APP_MODULE_DIR,
  GRADLE_BUILD_FILENAMES,
  GRADLE_SETTINGS_FILENAMES,
  LOG_FILE_EXTENSIONS
} from "../constants.ts"

/**
 * Nearest ancestor holding a Gradle settings file, else the nearest one with a
 * Gradle build file, else `startDir` itself.
 */
export async function findProjectRoot(startDir: string): Promise<string> {
  const bySettings = await findUpAnyFile(startDir, GRADLE_SETTINGS_FILENAMES)
  if (bySettings) return bySettings

  const byBuild = await findUpAnyFile(startDir, GRADLE_BUILD_FILENAMES)
  if (byBuild) return byBuild

  return resolve(startDir)
}

export function resolveLogDir(projectRoot: string, logDir: string): string {
  return isAbsolute(logDir) ? logDir : resolve(projectRoot, logDir)
}

/** Most recently modified `.log`/`.txt` file in `logDir`, or null. */
export async function findNewestLogFile(logDir: string): Promise<string | null> {
  const files = await listFiles(logDir)
  const logs = files.filter(f =>
    (LOG_FILE_EXTENSIONS as readonly string[]).includes(extname(f.path).toLowerCase())
  )
  if (logs.length === 0) return null

  const newest = logs.reduce((best, f) => (f.mtimeMs > best.mtimeMs ? f : best))
  return newest.path
}

/**
 * Best-effort application id: `applicationId` in the app module's Gradle
 * file, then its `namespace`, then the manifest `package` attribute.
 */
export async function readAppId(projectRoot: string): Promise<string | null> {
  const moduleDir = resolve(projectRoot, APP_MODULE_DIR)

  for (const name of GRADLE_BUILD_FILENAMES) {
    const text = await readTextFile(resolve(moduleDir, name))
    if (text === null) continue
    const id = parseGradleAppId(text)
    if (id) return id
  }

  const manifest = await readTextFile(resolve(moduleDir, ANDROID_MANIFEST_PATH))
  return manifest === null ? null : parseManifestPackage(manifest)
}

/** Handles both Groovy (`applicationId "x"`) and Kotlin DSL (`applicationId = "x"`). */
export function parseGradleAppId(text: string): string | null {
  const code = stripLineComments(text)
  return (
    matchGradleString(code, "applicationId") ??
    matchGradleString(code, "namespace")
  )
}

export function parseManifestPackage(xml: string): string | null {
  const match = xml.match(/<manifest\b[^>]*\bpackage\s*=\s*"([^"]+)"/)
  return match?.[1] ?? null
}

function matchGradleString(code: string, key: string): string | null {
  const pattern = new RegExp(`^\\s*${key}\\s*=?\\s*["']([A-Za-z0-9_.]+)["']`, "m")
  const match = code.match(pattern)
  return match?.[1] ?? null
}

function stripLineComments(text: string): string {
  return text
    .split("\n")
    .map(line => line.replace(/^\s*\/\/.*$/, ""))
    .join("\n")
}
