import { defineCommand, withHandler } from "../cli/command.ts"
import { filterOptions, optNoReplay, optProducerPid } from "../cli/options.ts"
import { resolveViewerConfig } from "../cli/viewer-config.ts"
import { runViewer } from "../viewer/session.ts"

import type { CliContext, CommandArgs } from "../cli/command.ts"

const options = [...filterOptions, optNoReplay, optProducerPid] as const
const positionals = [
  {
    name: "file",
    required: false,
    description: "Log file to follow (default: newest file in <project>/.logq/logs)"
  }
] as const

type ViewArgs = CommandArgs<typeof options, typeof positionals>

const spec = defineCommand({
  name: "view",
  summary: "Follow a logcat file in an interactive, filterable view",
  group: "Viewer",
  description:
    "Keys: q quit, space pause, p/P package filter, t tag, l level, / text, c/C clear, ? help.",
  options,
  positionals
} as const)

export const viewCommand = withHandler(spec, handleView)

async function handleView({
  ctx,
  args
}: {
  readonly ctx: CliContext
  readonly args: ViewArgs
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
  return await runViewer(config)
}
