import { resolve } from "node:path"

import { z } from "zod"

import { readTextFile } from "./fs.ts"
import { isRecord } from "./guards.ts"
import {
  DEFAULT_BUFFER_CAPACITY,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_SEED_BYTES,
  LOGQ_PROJECT_DIR,
  PROJECT_CONFIG_FILENAME,
  PROJECT_LOG_DIR
} from "../constants.ts"

import type { LevelFilter, TextMatcher } from "../logcat/filter.ts"
import type { TailerReplay } from "../viewer/tailer.ts"

const ViewerSettingsInputSchema = z.object({
  capacity: z.number().int().positive().optional(),
  pollIntervalMs: z.number().int().min(10).optional(),
  seedBytes: z.number().int().nonnegative().optional(),
  logDir: z.string().min(1).optional()
})

const ViewerSettingsSchema = z.object({
  capacity: z.number().int().positive().default(DEFAULT_BUFFER_CAPACITY),
  pollIntervalMs: z.number().int().min(10).default(DEFAULT_POLL_INTERVAL_MS),
  seedBytes: z.number().int().nonnegative().default(DEFAULT_SEED_BYTES),
  logDir: z.string().min(1).default(PROJECT_LOG_DIR)
})

const ViewerEnvSchema = z.object({
  LOGQ_CAPACITY: z.coerce.number().int().positive().optional(),
  LOGQ_POLL_MS: z.coerce.number().int().min(10).optional(),
  LOGQ_SEED_BYTES: z.coerce.number().int().nonnegative().optional(),
  LOGQ_DEBUG_LOG: z.string().min(1).optional()
})

export type ViewerSettings = z.infer<typeof ViewerSettingsSchema>
type ViewerSettingsInput = z.infer<typeof ViewerSettingsInputSchema>

export type ViewerSettingsResult = {
  readonly settings: ViewerSettings
  readonly debugLogPath: string | null
  readonly parseError?: string
}

/**
 * Everything the viewer needs, resolved up front and passed in explicitly.
 */
export interface ViewerConfig {
  readonly logFile: string
  readonly projectRoot: string
  readonly packageName: string | null
  readonly packageFilterEnabled: boolean
  readonly tagFilter: TextMatcher | null
  readonly levelFilter: LevelFilter | null
  readonly textFilter: TextMatcher | null
  readonly replay: TailerReplay
  readonly capacity: number
  readonly pollIntervalMs: number
  readonly seedBytes: number
  readonly producerPid: number | null
  readonly debugLogPath: string | null
}

export function resolveProjectConfigPath(projectRoot: string): string {
  return resolve(projectRoot, LOGQ_PROJECT_DIR, PROJECT_CONFIG_FILENAME)
}

/**
 * Defaults, overridden by `<project>/.logq/config.json` (`{ "viewer": {...} }`),
 * overridden by LOGQ_* environment variables. A broken layer is skipped and
 * reported through `parseError`.
 */
export async function readViewerSettings(opts: {
  readonly projectRoot: string
  readonly env?: NodeJS.ProcessEnv
}): Promise<ViewerSettingsResult> {
  const fileLayer = await readFileLayer({ path: resolveProjectConfigPath(opts.projectRoot) })
  const envLayer = readEnvLayer(opts.env ?? process.env)

  const settings = ViewerSettingsSchema.parse({ ...fileLayer.settings, ...envLayer.settings })
  const parseError = [fileLayer.parseError, envLayer.parseError]
    .filter((e): e is string => typeof e === "string")
    .join("; ")

  return parseError.length > 0 ?
      { settings, debugLogPath: envLayer.debugLogPath, parseError }
    : { settings, debugLogPath: envLayer.debugLogPath }
}

type SettingsLayer = {
  readonly settings: ViewerSettingsInput
  readonly parseError?: string
}

async function readFileLayer(opts: { readonly path: string }): Promise<SettingsLayer> {
  const text = await readTextFile(opts.path)
  if (text === null) return { settings: {} }

  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : "Invalid JSON"
    return { settings: {}, parseError: `Config parse error (${opts.path}): ${message}` }
  }

  if (!isRecord(parsed)) {
    return { settings: {}, parseError: `Config parse error (${opts.path}): invalid config shape` }
  }

  const result = ViewerSettingsInputSchema.safeParse(parsed["viewer"] ?? {})
  if (!result.success) {
    return { settings: {}, parseError: `Config viewer error (${opts.path}): ${result.error.message}` }
  }
  return { settings: result.data }
}

function readEnvLayer(env: NodeJS.ProcessEnv): SettingsLayer & { readonly debugLogPath: string | null } {
  const result = ViewerEnvSchema.safeParse({
    LOGQ_CAPACITY: blankToUndefined(env.LOGQ_CAPACITY),
    LOGQ_POLL_MS: blankToUndefined(env.LOGQ_POLL_MS),
    LOGQ_SEED_BYTES: blankToUndefined(env.LOGQ_SEED_BYTES),
    LOGQ_DEBUG_LOG: blankToUndefined(env.LOGQ_DEBUG_LOG)
  })
  if (!result.success) {
    return {
      settings: {},
      debugLogPath: null,
      parseError: `Environment error: ${result.error.message}`
    }
  }

  const data = result.data
  const settings: ViewerSettingsInput = {
    ...(data.LOGQ_CAPACITY !== undefined ? { capacity: data.LOGQ_CAPACITY } : {}),
    ...(data.LOGQ_POLL_MS !== undefined ? { pollIntervalMs: data.LOGQ_POLL_MS } : {}),
    ...(data.LOGQ_SEED_BYTES !== undefined ? { seedBytes: data.LOGQ_SEED_BYTES } : {})
  }
  return { settings, debugLogPath: data.LOGQ_DEBUG_LOG ?? null }
}

function blankToUndefined(value: string | undefined): string | undefined {
  const trimmed = (value ?? "").trim()
  return trimmed.length > 0 ? trimmed : undefined
}
