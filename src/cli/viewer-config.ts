import { CliUsageError } from "./command.ts"
import { readViewerSettings } from "../lib/config.ts"
import { ensureAbsolutePath } from "../lib/path.ts"
import { findNewestLogFile, findProjectRoot, readAppId, resolveLogDir } from "../lib/project.ts"
import { FilterInputError, normalizePackageName, parseLevelFilter, parseTextMatcher } from "../logcat/filter.ts"
import { logger } from "../ui/logger.ts"

import type { ViewerConfig } from "../lib/config.ts"

export class LogFileNotFoundError extends Error {
  public constructor(message: string) {
    super(message)
    this.name = "LogFileNotFoundError"
  }
}

export interface ViewerArgs {
  readonly file: string | undefined
  readonly project: string | undefined
  readonly package: string | undefined
  readonly noPackage: boolean
  readonly tag: string | undefined
  readonly level: string | undefined
  readonly text: string | undefined
  readonly noReplay?: boolean
  readonly producerPid?: number | undefined
}

/**
 * Turns command-line input into the explicit config struct the viewer and
 * the print command run on. CLI options win over config file and env.
 */
export async function resolveViewerConfig(opts: {
  readonly cwd: string
  readonly args: ViewerArgs
  readonly env?: NodeJS.ProcessEnv
}): Promise<ViewerConfig> {
  const { cwd, args } = opts

  const projectRoot =
    args.project ? ensureAbsolutePath(args.project, cwd) : await findProjectRoot(cwd)

  const { settings, debugLogPath, parseError } = await readViewerSettings({
    projectRoot,
    ...(opts.env ? { env: opts.env } : {})
  })
  if (parseError) logger.warn({ message: `${parseError} (using defaults)` })

  const logFile =
    args.file ?
      ensureAbsolutePath(args.file, cwd)
    : await resolveDefaultLogFile(projectRoot, settings.logDir)

  const explicitPackage = normalizePackageName(args.package ?? null)
  const packageName = explicitPackage ?? (await readAppId(projectRoot))

  if (args.producerPid !== undefined && (!Number.isSafeInteger(args.producerPid) || args.producerPid <= 0)) {
    throw new CliUsageError(`Invalid --producer-pid: ${args.producerPid}`)
  }

  return {
    logFile,
    projectRoot,
    packageName,
    packageFilterEnabled: !args.noPackage && packageName !== null,
    tagFilter: parseTextMatcher(args.tag ?? ""),
    levelFilter: parseLevelOption(args.level),
    textFilter: parseTextMatcher(args.text ?? ""),
    replay: args.noReplay ? "none" : "tail",
    capacity: settings.capacity,
    pollIntervalMs: settings.pollIntervalMs,
    seedBytes: settings.seedBytes,
    producerPid: args.producerPid ?? null,
    debugLogPath
  }
}

async function resolveDefaultLogFile(projectRoot: string, logDir: string): Promise<string> {
  const dir = resolveLogDir(projectRoot, logDir)
  const newest = await findNewestLogFile(dir)
  if (!newest) {
    throw new LogFileNotFoundError(`No log file given and none found in ${dir}`)
  }
  return newest
}

function parseLevelOption(raw: string | undefined): ViewerConfig["levelFilter"] {
  try {
    return parseLevelFilter(raw ?? "")
  } catch (error: unknown) {
    if (error instanceof FilterInputError) throw new CliUsageError(error.message)
    throw error
  }
}
