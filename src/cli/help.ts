import { builtinOptions, formatPositionals, resolveCommand } from "./command.ts"

import type { AnyCommandSpec, CliGroup, CliSpec, OptionSpec } from "./command.ts"

const GROUP_TITLES = {
  Viewer: "Log commands",
  Diagnostics: "Diagnostics"
} as const satisfies Record<CliGroup, string>

type Row = readonly [left: string, right: string]

export function renderHelpForPath(cli: CliSpec, positionals: readonly string[]): string {
  const { command } = resolveCommand(cli, positionals)
  return command ? renderCommandHelp(cli, command) : renderRootHelp(cli)
}

export function printHelpForPath(cli: CliSpec, positionals: readonly string[]): void {
  process.stdout.write(renderHelpForPath(cli, positionals))
}

function renderRootHelp(cli: CliSpec): string {
  const sections = [
    [`${cli.name} v${cli.version} — ${cli.summary}`],
    ["Usage:", `  ${cli.name} <command> [options]`]
  ]

  for (const group of Object.keys(GROUP_TITLES).filter(isCliGroup)) {
    const rows = cli.commands
      .filter(c => c.group === group)
      .map((c): Row => [usageOf(cli, c), c.summary])
      .sort((a, b) => a[0].localeCompare(b[0]))
    if (rows.length > 0) sections.push([`${GROUP_TITLES[group]}:`, ...table(rows)])
  }

  sections.push(["Global options:", ...table(builtinOptions().map(optionRow))])
  sections.push([`Run \`${cli.name} help <command>\` for the options of a command.`])
  return render(sections)
}

function renderCommandHelp(cli: CliSpec, command: AnyCommandSpec): string {
  const usage = usageOf(cli, command)
  const sections = [[`${usage} — ${command.summary}`], ["Usage:", `  ${usage} [options]`]]

  if (command.description) sections.push([command.description])

  const args = command.positionals.flatMap(p => (p.description ? [[p.name, p.description] as const] : []))
  if (args.length > 0) sections.push(["Arguments:", ...table(args)])

  sections.push(["Options:", ...table([...command.options, ...builtinOptions()].map(optionRow))])
  return render(sections)
}

function usageOf(cli: CliSpec, command: AnyCommandSpec): string {
  const args = formatPositionals(command.positionals)
  return args ? `${cli.name} ${command.name} ${args}` : `${cli.name} ${command.name}`
}

function optionRow(opt: OptionSpec): Row {
  const flags = opt.short ? `${opt.long}, ${opt.short}` : opt.long
  const value = opt.type === "boolean" ? "" : ` ${opt.valueHint ?? "<value>"}`
  return [`${flags}${value}`, opt.description]
}

function table(rows: readonly Row[]): string[] {
  const width = Math.max(0, ...rows.map(([left]) => left.length)) + 2
  return rows.map(([left, right]) => `  ${left.padEnd(width)}${right}`)
}

function render(sections: readonly (readonly string[])[]): string {
  return `${sections.map(lines => lines.join("\n")).join("\n\n")}\n`
}

function isCliGroup(value: string): value is CliGroup {
  return value in GROUP_TITLES
}
