import { parseArgs as nodeParseArgs } from "node:util"

import { isRecord, isStringArray } from "../lib/guards.ts"

export type CliGroup = "Viewer" | "Diagnostics"

export type OptionType = "boolean" | "string" | "number"

export interface OptionSpec<Name extends string = string> {
  readonly name: Name
  readonly type: OptionType
  readonly long: `--${string}`
  readonly short?: `-${string}`
  readonly valueHint?: string // e.g. "<pid>"
  readonly description: string
}

export interface PositionalSpec<Name extends string = string> {
  readonly name: Name
  readonly required?: boolean
  readonly multiple?: boolean
  readonly description?: string
}

export interface CliContext {
  readonly cwd: string
  readonly cli: CliSpec
}

export type OptionValue<T extends OptionType> =
  T extends "boolean" ? boolean
  : T extends "number" ? number | undefined
  : string | undefined

export type OptionsValues<Opts extends readonly OptionSpec[]> = Prettify<{
  readonly [O in Opts[number] as O["name"]]: OptionValue<O["type"]>
}>

type PositionalValue<S extends PositionalSpec> =
  S extends { multiple: true } ? string[]
  : S extends { required: true } ? string
  : string | undefined

export type PositionalsValues<Pos extends readonly PositionalSpec[]> = Prettify<{
  readonly [P in Pos[number] as P["name"]]: PositionalValue<P>
}>

export type CommandArgs<
  Opts extends readonly OptionSpec[],
  Pos extends readonly PositionalSpec[]
> = {
  readonly options: OptionsValues<Opts>
  readonly positionals: PositionalsValues<Pos>
  readonly argv: readonly string[]
}

export interface CommandSpec<
  Name extends string = string,
  Opts extends readonly OptionSpec[] = readonly OptionSpec[],
  Pos extends readonly PositionalSpec[] = readonly PositionalSpec[]
> {
  readonly name: Name
  readonly summary: string
  readonly group: CliGroup
  readonly description?: string
  readonly options: Opts
  readonly positionals: Pos
}

export type AnyCommandSpec = CommandSpec

export type CommandHandlerFor<C extends AnyCommandSpec> = (input: {
  readonly ctx: CliContext
  readonly args: CommandArgs<C["options"], C["positionals"]>
}) => Promise<number>

export type CommandWithHandler<C extends AnyCommandSpec> = C & {
  readonly handler: CommandHandlerFor<C>
}

export interface CliSpec {
  readonly name: string
  readonly version: string
  readonly summary: string
  readonly commands: readonly AnyCommandSpec[]
}

export class CliUsageError extends Error {
  public constructor(message: string) {
    super(message)
    this.name = "CliUsageError"
  }
}

export function defineOption<const O extends OptionSpec>(opt: O): O {
  return opt
}

export function defineCommand<const C extends AnyCommandSpec>(cmd: C): C {
  return cmd
}

export function defineCli<const C extends CliSpec>(cli: C): C {
  return cli
}

export function withHandler<const C extends AnyCommandSpec>(
  cmd: C,
  handler: CommandHandlerFor<C>
): CommandWithHandler<C> {
  return { ...cmd, handler }
}

export function hasHandler(cmd: AnyCommandSpec): cmd is CommandWithHandler<AnyCommandSpec> {
  return "handler" in cmd && typeof cmd.handler === "function"
}

const HELP_OPTION = defineOption({
  name: "help",
  type: "boolean",
  long: "--help",
  short: "-h",
  description: "Show help"
} as const)

const VERSION_OPTION = defineOption({
  name: "version",
  type: "boolean",
  long: "--version",
  short: "-v",
  description: "Show version"
} as const)

export function builtinOptions(): readonly OptionSpec[] {
  return [HELP_OPTION, VERSION_OPTION]
}

export interface ResolvedCommand {
  readonly command: AnyCommandSpec | null
  readonly remainingPositionals: readonly string[]
}

/** The first positional names the command; the rest belong to it. */
export function resolveCommand(cli: CliSpec, positionals: readonly string[]): ResolvedCommand {
  const [first, ...rest] = positionals
  const command = first === undefined ? null : (cli.commands.find(c => c.name === first) ?? null)
  return command ?
      { command, remainingPositionals: rest }
    : { command: null, remainingPositionals: positionals }
}

export interface ParsedCliInvocation {
  readonly values: Record<string, unknown>
  readonly positionals: readonly string[]
}

/**
 * Parses argv against every option any command declares; which of them the
 * resolved command accepts is checked afterwards.
 */
export function parseCliArgv(cli: CliSpec, argv: readonly string[]): ParsedCliInvocation {
  const options: Record<string, { type: "string" | "boolean"; short?: string }> = {}
  for (const opt of allOptions(cli)) {
    const type = opt.type === "boolean" ? "boolean" : "string"
    options[optionKey(opt)] = opt.short ? { type, short: opt.short.slice(1) } : { type }
  }

  let parsed: { readonly values: unknown; readonly positionals: unknown }
  try {
    parsed = nodeParseArgs({ args: [...argv], options, strict: true, allowPositionals: true })
  } catch (error: unknown) {
    throw new CliUsageError(error instanceof Error ? error.message : "Invalid arguments")
  }

  return {
    values: isRecord(parsed.values) ? parsed.values : {},
    positionals: isStringArray(parsed.positionals) ? parsed.positionals : []
  }
}

/** Option keys (long names without dashes) the command accepts, built-ins included. */
export function allowedOptionKeys(command: AnyCommandSpec): ReadonlySet<string> {
  return new Set([...builtinOptions(), ...command.options].map(optionKey))
}

export function parseOptionsForCommand<Opts extends readonly OptionSpec[]>(
  opts: Opts,
  values: Record<string, unknown>
): OptionsValues<Opts> {
  const out: Record<string, unknown> = {}

  for (const opt of opts) {
    const raw = values[optionKey(opt)]
    if (opt.type === "boolean") {
      out[opt.name] = raw === true
    } else if (typeof raw !== "string") {
      out[opt.name] = undefined
    } else if (opt.type === "string") {
      out[opt.name] = raw
    } else {
      const n = Number(raw)
      if (raw.trim().length === 0 || !Number.isFinite(n)) {
        throw new CliUsageError(`${opt.long} expects a number (got "${raw}")`)
      }
      out[opt.name] = n
    }
  }

  return out as OptionsValues<Opts>
}

export function parsePositionalsForCommand<Pos extends readonly PositionalSpec[]>(
  specs: Pos,
  remaining: readonly string[]
): PositionalsValues<Pos> {
  const out: Record<string, unknown> = {}
  let idx = 0

  for (const spec of specs) {
    if (spec.multiple) {
      out[spec.name] = remaining.slice(idx)
      idx = remaining.length
      continue
    }
    const value = remaining[idx]
    if (value === undefined && spec.required) {
      throw new CliUsageError(`Missing required argument: ${spec.name}`)
    }
    out[spec.name] = value
    if (value !== undefined) idx += 1
  }

  if (idx < remaining.length) {
    throw new CliUsageError(`Unexpected arguments: ${remaining.slice(idx).join(" ")}`)
  }

  return out as PositionalsValues<Pos>
}

/** `[file]`, `<name>`, `[path...]` */
export function formatPositionals(specs: readonly PositionalSpec[]): string {
  return specs
    .map(p => {
      const name = p.multiple ? `${p.name}...` : p.name
      return p.required ? `<${name}>` : `[${name}]`
    })
    .join(" ")
}

export function optionKey(opt: OptionSpec): string {
  return opt.long.slice(2)
}

function allOptions(cli: CliSpec): OptionSpec[] {
  return [...builtinOptions(), ...cli.commands.flatMap(c => c.options)]
}

export type Prettify<T> = { [K in keyof T]: T[K] } & {}
