export const LOGQ_PROJECT_DIR = ".logq" as const
export const PROJECT_LOG_DIR = ".logq/logs" as const
export const PROJECT_CONFIG_FILENAME = "config.json" as const

export const LOG_FILE_EXTENSIONS = [".log", ".txt"] as const

export const GRADLE_SETTINGS_FILENAMES = ["settings.gradle.kts", "settings.gradle"] as const
export const GRADLE_BUILD_FILENAMES = ["build.gradle.kts", "build.gradle"] as const
export const APP_MODULE_DIR = "app" as const
export const ANDROID_MANIFEST_PATH = "src/main/AndroidManifest.xml" as const

export const DEFAULT_BUFFER_CAPACITY = 10_000 as const
export const DEFAULT_POLL_INTERVAL_MS = 250 as const
/**
 * How much of an existing log file is replayed into the buffer at startup.
 * 4 MiB comfortably covers 10k logcat lines of typical width.
 */
export const DEFAULT_SEED_BYTES = 4 * 1024 * 1024
export const READ_CHUNK_BYTES = 64 * 1024
/** Bytes before the read position compared on every poll to spot an in-place rewrite. */
export const REWRITE_CHECK_BYTES = 64
