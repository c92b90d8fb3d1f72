import { defineCommand, withHandler } from "../cli/command.ts"
import { filterOptions, optFollow, optNoReplay, optProducerPid } from "../cli/options.ts"
import { resolveViewerConfig } from "../cli/viewer-config.ts"
import { runLogPrint } from "../ui/log-print.ts"
import { isColorEnabled } from "../ui/terminal.ts"

import type { CliContext, CommandArgs } from "../cli/command.ts"

const options = [...filterOptions, optFollow, optNoReplay, optProducerPid] as const
const positionals = [
  {
    name: "file",
    required: false,
    description: "Log file to print (default: newest file in <project>/.logq/logs)"
  }
] as const

type PrintArgs = CommandArgs<typeof options, typeof positionals>

const spec = defineCommand({
  name: "print",
  summary: "Print the lines of a logcat file that pass the filters",
  group: "Viewer",
  options,
  positionals
} as const)

export const printCommand = withHandler(spec, handlePrint)

async function handlePrint({
  ctx,
  args
}: {
  readonly ctx: CliContext
  readonly args: PrintArgs
}): Promise<number> {
  const config = await resolveViewerConfig({
    cwd: ctx.cwd,
    args: {
      file: args.positionals.file,
      project: args.options.project,
      package: args.options.package,
      noPackage: args.options.noPackage,
      tag: args.options.tag,
      level: args.options.level,
      text: args.options.text,
      noReplay: args.options.noReplay,
      producerPid: args.options.producerPid
    }
  })
  return await runLogPrint({ config, follow: args.options.follow, color: isColorEnabled() })
}
