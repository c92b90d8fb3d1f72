import { cancel } from "@clack/prompts"

import { CLI_SPEC } from "./spec.ts"
import { printHelpForPath } from "./help.ts"
import { LogFileNotFoundError } from "./viewer-config.ts"
import {
  CliUsageError,
  allowedOptionKeys,
  hasHandler,
  parseCliArgv,
  parseOptionsForCommand,
  parsePositionalsForCommand,
  resolveCommand
} from "./command.ts"
import { logger } from "../ui/logger.ts"
import { TailerOpenError } from "../viewer/tailer.ts"

import type { CliSpec } from "./command.ts"

/** Runs one invocation and resolves with the process exit code. */
export async function runCli(
  argv: readonly string[],
  opts?: { readonly cli?: CliSpec; readonly cwd?: string }
): Promise<number> {
  const cli = opts?.cli ?? CLI_SPEC
  try {
    const parsed = parseCliArgv(cli, argv)

    if (parsed.values["version"] === true) {
      process.stdout.write(`${cli.name} v${cli.version}\n`)
      return 0
    }

    if (parsed.values["help"] === true) {
      printHelpForPath(cli, parsed.positionals)
      return 0
    }

    const { command, remainingPositionals } = resolveCommand(cli, parsed.positionals)
    if (!command) {
      const [name] = parsed.positionals
      if (name !== undefined) throw new CliUsageError(`Unknown command: ${name}`)
      printHelpForPath(cli, [])
      return 1
    }

    const allowed = allowedOptionKeys(command)
    const rejected = Object.keys(parsed.values).filter(key => !allowed.has(key))
    if (rejected.length > 0) {
      throw new CliUsageError(
        `Option(s) not valid for "${command.name}": ${rejected.map(key => `--${key}`).join(", ")}`
      )
    }

    if (!hasHandler(command)) {
      printHelpForPath(cli, [command.name])
      return 1
    }

    return await command.handler({
      ctx: { cwd: opts?.cwd ?? process.cwd(), cli },
      args: {
        options: parseOptionsForCommand(command.options, parsed.values),
        positionals: parsePositionalsForCommand(command.positionals, remainingPositionals),
        argv
      }
    })
  } catch (error: unknown) {
    if (error instanceof CliUsageError) {
      logger.error({ message: error.message })
      printHelpForPath(cli, [])
      return 1
    }

    if (error instanceof LogFileNotFoundError || error instanceof TailerOpenError) {
      logger.error({ message: error.message })
      return 1
    }

    cancel(error instanceof Error ? error.message : "Unknown error")
    if (error instanceof Error && error.stack) {
      logger.debug({ message: error.stack })
    }
    return 1
  }
}
